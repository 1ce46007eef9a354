import { Controller, Get, Query } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { StatisticsService } from './statistics.service';
import { StatisticsQueryDto } from './dto/statistics-query.dto';
import { StatisticsOverviewResponseDto } from './dto/statistics-overview-response.dto';

@ApiTags('Statistics')
@Controller({ path: 'statistics', version: '1' })
export class StatisticsController {
  constructor(private readonly statisticsService: StatisticsService) {}

  @Get('overview')
  @ApiOperation({ summary: 'Document totals, storage usage and categories' })
  @ApiOkResponse({ type: StatisticsOverviewResponseDto })
  async getOverview(
    @Query() query: StatisticsQueryDto,
  ): Promise<StatisticsOverviewResponseDto> {
    return this.statisticsService.getOverview({
      startDate: query.startDate,
      endDate: query.endDate,
    });
  }
}
