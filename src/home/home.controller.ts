import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Name, version and description of the API.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Medical Records API' },
        version: { type: 'string', example: '1.0.0' },
        description: { type: 'string' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health/storage')
  @ApiOperation({
    summary: 'Storage Health Check',
    description: 'Check that the document bucket is reachable.',
  })
  @ApiOkResponse({
    description: 'Storage health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        bucket: { type: 'string', example: 'medical-records-raw' },
        error: { type: 'string', nullable: true },
      },
    },
  })
  async storageHealth() {
    return this.healthService.checkStorageHealth();
  }
}
