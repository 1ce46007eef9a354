import { Controller, Get, Param, Query } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { PatientSearchService } from './patient-search.service';
import {
  PatientDocumentsQueryDto,
  PatientSearchQueryDto,
  PatientSuggestionQueryDto,
} from './dto/patient-search-query.dto';
import {
  PatientSearchResponseDto,
  PatientSuggestionsResponseDto,
} from './dto/patient-search-response.dto';

@ApiTags('Patient Search')
@Controller({ path: 'search/patients', version: '1' })
export class PatientSearchController {
  constructor(private readonly patientSearchService: PatientSearchService) {}

  @Get()
  @ApiOperation({
    summary: 'Search documents by approximate patient name',
    description:
      'Ranks documents using exact, prefix, substring, fuzzy and word-overlap matching.',
  })
  @ApiOkResponse({ type: PatientSearchResponseDto })
  @ApiBadRequestResponse({ description: 'Empty term or invalid pagination' })
  async searchPatients(
    @Query() query: PatientSearchQueryDto,
  ): Promise<PatientSearchResponseDto> {
    return this.patientSearchService.searchPatients(query);
  }

  // Declared before ':patientName/documents' so 'suggestions' is not read as a name
  @Get('suggestions')
  @ApiOperation({ summary: 'Autocomplete distinct patient names' })
  @ApiOkResponse({ type: PatientSuggestionsResponseDto })
  async suggestPatientNames(
    @Query() query: PatientSuggestionQueryDto,
  ): Promise<PatientSuggestionsResponseDto> {
    return this.patientSearchService.suggestPatientNames(query);
  }

  @Get(':patientName/documents')
  @ApiOperation({
    summary: 'Documents of one patient',
    description: 'Only exact and prefix name matches are returned.',
  })
  @ApiParam({ name: 'patientName', example: 'GOMEZ, ANA' })
  @ApiOkResponse({ type: PatientSearchResponseDto })
  async documentsForPatient(
    @Param('patientName') patientName: string,
    @Query() query: PatientDocumentsQueryDto,
  ): Promise<PatientSearchResponseDto> {
    return this.patientSearchService.documentsForPatient(patientName, query);
  }
}
