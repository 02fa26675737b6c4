import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HEALTH_STATUS_SCHEMA } from './health.schemas';
import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Service, network and dependency health' })
  @ApiResponse({ status: 200, description: 'Health status', schema: HEALTH_STATUS_SCHEMA })
  public async getHealthStatus(): Promise<AppHealthStatus> {
    return this.healthService.getHealthStatus();
  }
}
