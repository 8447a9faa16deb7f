import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { InFlightRegistry, StorageAdapter, StorageStatistics } from '../../../core';
import { IN_FLIGHT_REGISTRY, STORAGE_ADAPTER } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import { RecurringBillingProcessor } from '../services/recurring-billing.processor';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
  ApiServiceStatistics,
} from '../../../_shared/swagger/decorators';

type SchedulerState = 'running' | 'stopped' | 'disabled';

/**
 * Health Controller
 * Liveness, readiness and runtime statistics
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(IN_FLIGHT_REGISTRY)
    private readonly inFlight: InFlightRegistry,
    private readonly configuration: ConfigurationService,
    private readonly processor: RecurringBillingProcessor,
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
  async readiness(): Promise<{
    status: string;
    checks: {
      database: boolean;
      scheduler: boolean;
    };
    details: {
      database: string;
      scheduler: SchedulerState;
    };
  }> {
    const databaseHealthy = await this.storageAdapter.isHealthy();
    const scheduler = this.schedulerState();
    const schedulerHealthy = scheduler !== 'stopped';

    return {
      status: databaseHealthy && schedulerHealthy ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
        scheduler: schedulerHealthy,
      },
      details: {
        database: databaseHealthy ? 'connected' : 'disconnected',
        scheduler,
      },
    };
  }

  @Get('stats')
  @ApiServiceStatistics()
  async statistics(): Promise<{
    storage: StorageStatistics;
    scheduler: {
      enabled: boolean;
      running: boolean;
      tickInProgress: boolean;
      inFlight: number;
      lastTick: {
        finishedAt: Date;
        payments: number;
        errors: number;
        skipped: number;
        durationMs: number;
      } | null;
    };
    runtime: {
      uptime: number;
      memory: NodeJS.MemoryUsage;
      node: string;
    };
  }> {
    const storage = await this.storageAdapter.getStatistics();
    const lastReport = this.processor.getLastReport();

    return {
      storage,
      scheduler: {
        enabled: this.configuration.isSchedulerEnabled(),
        running: this.processor.isRunning(),
        tickInProgress: this.processor.isTickInProgress(),
        inFlight: this.inFlight.size,
        lastTick: lastReport
          ? {
              finishedAt: lastReport.finishedAt,
              payments: lastReport.payments.length,
              errors: lastReport.errors.length,
              skipped: lastReport.skipped.length,
              durationMs: lastReport.durationMs,
            }
          : null,
      },
      runtime: {
        uptime: process.uptime(),
        memory: process.memoryUsage(),
        node: process.version,
      },
    };
  }

  private schedulerState(): SchedulerState {
    if (!this.configuration.isSchedulerEnabled()) {
      return 'disabled';
    }
    return this.processor.isRunning() ? 'running' : 'stopped';
  }
}
