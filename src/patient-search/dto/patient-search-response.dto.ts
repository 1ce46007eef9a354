import { ApiProperty } from '@nestjs/swagger';
import { DocumentResponseDto } from '../../document-processing/dto/document-response.dto';
import { MatchType } from '../domain/utils/similarity-scorer';

export class PatientSearchMatchDto {
  @ApiProperty({ type: DocumentResponseDto })
  document!: DocumentResponseDto;

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.8308 })
  similarityScore!: number;

  @ApiProperty({ enum: MatchType })
  matchType!: MatchType;
}

export class PatientSearchResponseDto {
  @ApiProperty()
  searchTerm!: string;

  @ApiProperty({ example: 'MARIA ALANIS' })
  normalizedTerm!: string;

  @ApiProperty({ type: [PatientSearchMatchDto] })
  documents!: PatientSearchMatchDto[];

  @ApiProperty()
  totalFound!: number;

  @ApiProperty()
  limit!: number;

  @ApiProperty()
  skip!: number;

  @ApiProperty()
  hasNext!: boolean;

  @ApiProperty()
  hasPrev!: boolean;

  @ApiProperty()
  totalPages!: number;

  @ApiProperty({ enum: MatchType, isArray: true })
  strategiesUsed!: MatchType[];

  @ApiProperty()
  minSimilarity!: number;
}

export class PatientSuggestionDto {
  @ApiProperty({ example: 'GOMEZ, ANA' })
  name!: string;

  @ApiProperty()
  score!: number;

  @ApiProperty({ enum: MatchType })
  matchType!: MatchType;

  @ApiProperty({ description: 'Number of documents stored under this name' })
  documentCount!: number;
}

export class PatientSuggestionsResponseDto {
  @ApiProperty()
  partialTerm!: string;

  @ApiProperty()
  normalizedTerm!: string;

  @ApiProperty({ type: [PatientSuggestionDto] })
  suggestions!: PatientSuggestionDto[];
}
