import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { GatewayStatusClient, StorageAdapter } from '../../../core';
import { GATEWAY_CLIENT, STORAGE_ADAPTER } from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';
import { ConfigurationService } from '../services/configuration.service';
import { ReconciliationScheduler } from '../services/reconciliation.scheduler';

export interface ReadinessResponse {
  status: 'ready' | 'not_ready';
  checks: {
    database: boolean;
  };
  details: {
    database: 'connected' | 'disconnected';
    gateway: string;
    scheduler: {
      enabled: boolean;
      active: boolean;
      running: boolean;
      lastRunId: string | null;
    };
  };
}

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(GATEWAY_CLIENT)
    private readonly gateway: GatewayStatusClient,
    @Inject(ReconciliationScheduler)
    private readonly scheduler: ReconciliationScheduler,
    @Inject(ConfigurationService)
    private readonly configuration: ConfigurationService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<ReadinessResponse> {
    const databaseHealthy = await this.storageAdapter.isHealthy();

    return {
      status: databaseHealthy ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
      },
      details: {
        database: databaseHealthy ? 'connected' : 'disconnected',
        gateway: this.gateway.gatewayName,
        scheduler: {
          enabled: this.configuration.isSchedulerEnabled(),
          active: this.scheduler.isActive(),
          running: this.scheduler.isBusy(),
          lastRunId: this.scheduler.getLastReport()?.runId ?? null,
        },
      },
    };
  }
}
