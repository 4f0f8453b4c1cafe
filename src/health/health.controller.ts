import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';

export interface ReadinessFailure {
  status: 'error';
  database: 'disconnected';
  error: string;
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private db: TypeOrmHealthIndicator,
  ) {}

  @Get('liveness')
  @ApiOperation({ summary: 'Liveness probe' })
  liveness() {
    // Always OK: liveness must not depend on the database
    return {
      status: 'ok',
      info: {
        api: { status: 'up' },
      },
    };
  }

  @HealthCheck()
  @Get('readiness')
  @ApiOperation({ summary: 'Readiness probe' })
  async readiness(): Promise<HealthCheckResult | ReadinessFailure> {
    try {
      return await this.health.check([() => this.db.pingCheck('database')]);
    } catch (error) {
      return {
        status: 'error',
        database: 'disconnected',
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
