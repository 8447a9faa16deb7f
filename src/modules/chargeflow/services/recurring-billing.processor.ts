import {
  Injectable,
  Inject,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { Clock, PaymentService, TickReport } from '../../../core';
import { CLOCK } from '../constants';
import { ConfigurationService } from './configuration.service';

/**
 * Recurring Billing Processor
 *
 * Runs the recurring payment scheduler on an interval timer
 */
@Injectable()
export class RecurringBillingProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RecurringBillingProcessor.name);
  private intervalId?: NodeJS.Timeout;
  private currentTick: Promise<TickReport | null> | null = null;
  private abortController: AbortController | null = null;
  private lastReport: TickReport | null = null;

  constructor(
    @Inject(PaymentService)
    private readonly paymentService: PaymentService,
    private readonly configuration: ConfigurationService,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  onModuleInit() {
    if (this.configuration.isSchedulerEnabled()) {
      this.startProcessing();
    }
  }

  async onModuleDestroy() {
    await this.stopProcessing();
  }

  /**
   * Start the tick timer
   */
  startProcessing(): void {
    if (this.intervalId) {
      return;
    }

    const intervalMs = this.configuration.getTickIntervalMs();
    this.logger.log(`Starting recurring billing (interval: ${intervalMs}ms)`);

    this.intervalId = setInterval(() => {
      void this.processDueSubscriptions();
    }, intervalMs);

    // Process immediately on start
    void this.processDueSubscriptions();
  }

  /**
   * Stop the timer, abort the running tick and wait for it to settle
   */
  async stopProcessing(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped recurring billing');
    }

    this.abortController?.abort();
    if (this.currentTick) {
      await this.currentTick;
    }
  }

  /**
   * Run one tick unless the previous one is still going
   */
  async processDueSubscriptions(): Promise<TickReport | null> {
    if (this.currentTick) {
      this.logger.debug('Previous tick still running, skipping');
      return null;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.currentTick = this.runTick(controller.signal);

    try {
      return await this.currentTick;
    } finally {
      this.currentTick = null;
      this.abortController = null;
    }
  }

  /**
   * Manually trigger processing
   */
  async triggerProcessing(): Promise<TickReport | null> {
    this.logger.log('Manually triggering recurring billing');
    return this.processDueSubscriptions();
  }

  isRunning(): boolean {
    return this.intervalId !== undefined;
  }

  isTickInProgress(): boolean {
    return this.currentTick !== null;
  }

  getLastReport(): TickReport | null {
    return this.lastReport;
  }

  private async runTick(signal: AbortSignal): Promise<TickReport | null> {
    try {
      const report = await this.paymentService
        .getScheduler()
        .runTick(this.clock.now(), { signal });
      this.lastReport = report;
      return report;
    } catch (error) {
      this.logger.error(
        'Error processing recurring payments:',
        error instanceof Error ? error.stack : String(error),
      );
      return null;
    }
  }
}
