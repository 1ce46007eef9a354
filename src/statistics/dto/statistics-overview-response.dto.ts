import { ApiProperty } from '@nestjs/swagger';

class StatisticsTotalsDto {
  @ApiProperty()
  documents!: number;

  @ApiProperty()
  uniqueUsers!: number;

  @ApiProperty()
  completed!: number;

  @ApiProperty()
  failed!: number;

  @ApiProperty()
  validMedicalInfo!: number;
}

class StatisticsStorageDto {
  @ApiProperty()
  totalSizeBytes!: number;

  @ApiProperty()
  averageSizeBytes!: number;

  @ApiProperty()
  maxSizeBytes!: number;

  @ApiProperty()
  totalSizeMb!: number;

  @ApiProperty()
  averageSizeMb!: number;

  @ApiProperty()
  maxSizeMb!: number;
}

class StatisticsPeriodDto {
  @ApiProperty({ type: String, nullable: true })
  startDate!: string | null;

  @ApiProperty({ type: String, nullable: true })
  endDate!: string | null;

  @ApiProperty()
  filtered!: boolean;
}

export class StatisticsOverviewResponseDto {
  @ApiProperty({ type: StatisticsTotalsDto })
  totals!: StatisticsTotalsDto;

  @ApiProperty({ type: StatisticsStorageDto })
  storage!: StatisticsStorageDto;

  @ApiProperty({
    description: 'Documents per category code',
    example: { LAB: 12, EMER: 3 },
  })
  categories!: Record<string, number>;

  @ApiProperty({ type: StatisticsPeriodDto })
  period!: StatisticsPeriodDto;
}
