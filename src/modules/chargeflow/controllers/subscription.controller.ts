import {
  Controller,
  Get,
  Post,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Payment, PaymentService, Subscription } from '../../../core';
import {
  ApiCreateSubscription,
  ApiListSubscriptions,
  ApiGetSubscription,
  ApiSubscriptionLifecycle,
  ApiProcessSubscription,
} from '../../../_shared/swagger/decorators';
import {
  CreateSubscriptionDto,
  ListSubscriptionsDto,
  ProcessAtDto,
} from '../../../_shared/dto';
import { rethrowAsHttp, toHttpException } from './engine-error.mapper';

/**
 * Subscription Controller
 */
@ApiTags('Subscriptions')
@Controller('subscriptions')
export class SubscriptionController {
  private readonly logger = new Logger(SubscriptionController.name);

  constructor(
    @Inject(PaymentService)
    private readonly paymentService: PaymentService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateSubscription()
  async createSubscription(
    @Body() dto: CreateSubscriptionDto,
  ): Promise<Subscription> {
    this.logger.log(`Creating ${dto.interval} subscription for ${dto.customerRef}`);

    try {
      return await this.paymentService.createSubscription({
        amount: dto.amount,
        currency: dto.currency ?? 'USD',
        customerRef: dto.customerRef,
        interval: dto.interval,
        nextPaymentDate: dto.nextPaymentDate
          ? new Date(dto.nextPaymentDate)
          : undefined,
      });
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }

  @Get()
  @ApiListSubscriptions()
  async listSubscriptions(
    @Query() query: ListSubscriptionsDto,
  ): Promise<Subscription[]> {
    return this.paymentService.listSubscriptions({
      status: query.status,
      customerRef: query.customerRef,
    });
  }

  @Get(':id')
  @ApiGetSubscription()
  async getSubscription(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Subscription> {
    try {
      return await this.paymentService.getSubscription(id);
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }

  @Post(':id/pause')
  @HttpCode(HttpStatus.OK)
  @ApiSubscriptionLifecycle('pause')
  async pauseSubscription(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Subscription> {
    try {
      return await this.paymentService.pauseSubscription(id);
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }

  @Post(':id/resume')
  @HttpCode(HttpStatus.OK)
  @ApiSubscriptionLifecycle('resume')
  async resumeSubscription(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Subscription> {
    try {
      return await this.paymentService.resumeSubscription(id);
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiSubscriptionLifecycle('cancel')
  async cancelSubscription(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Subscription> {
    try {
      return await this.paymentService.cancelSubscription(id);
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }

  @Post(':id/process')
  @HttpCode(HttpStatus.CREATED)
  @ApiProcessSubscription()
  async processSubscription(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ProcessAtDto,
  ): Promise<Payment> {
    const result = await this.paymentService.processSubscription(
      id,
      dto.now ? new Date(dto.now) : undefined,
    );

    if (!result.success) {
      throw toHttpException(result.error, result.payment);
    }

    return result.payment;
  }
}
