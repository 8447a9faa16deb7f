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
import { Payment, PaymentService } from '../../../core';
import {
  ApiProcessPayment,
  ApiRefundPayment,
  ApiProcessRecurring,
  ApiListPayments,
  ApiGetPayment,
} from '../../../_shared/swagger/decorators';
import {
  ProcessPaymentDto,
  ListPaymentsDto,
  ProcessAtDto,
  RecurringScanResponseDto,
} from '../../../_shared/dto';
import { rethrowAsHttp, toHttpException } from './engine-error.mapper';

/**
 * Payment Controller
 * Thin HTTP layer over PaymentService
 */
@ApiTags('Payments')
@Controller('payments')
export class PaymentController {
  private readonly logger = new Logger(PaymentController.name);

  constructor(
    @Inject(PaymentService)
    private readonly paymentService: PaymentService,
  ) {}

  @Post('process')
  @HttpCode(HttpStatus.CREATED)
  @ApiProcessPayment()
  async processPayment(@Body() dto: ProcessPaymentDto): Promise<Payment> {
    const result = await this.paymentService.executeProcessPayment({
      amount: dto.amount,
      currency: dto.currency ?? 'USD',
      customerRef: dto.customerRef,
    });

    if (!result.success) {
      throw toHttpException(result.error, result.payment);
    }

    return result.payment;
  }

  @Post('process-recurring')
  @HttpCode(HttpStatus.OK)
  @ApiProcessRecurring()
  async processRecurring(
    @Body() dto: ProcessAtDto,
  ): Promise<RecurringScanResponseDto> {
    const now = dto.now ? new Date(dto.now) : undefined;
    const { payments, errors } = await this.paymentService.triggerRecurringScan(now);

    this.logger.log(
      `Recurring run: ${payments.length} payments, ${errors.length} errors`,
    );

    return {
      processed: payments.length,
      payments: payments.map((p) => p.toPlainObject()),
      errors: errors.map((e) => ({
        subscriptionId: e.subscriptionId,
        code: e.error.code,
        message: e.error.message,
        paymentId: e.payment?.id ?? null,
      })),
    };
  }

  @Post(':id/refund')
  @HttpCode(HttpStatus.OK)
  @ApiRefundPayment()
  async refundPayment(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Payment> {
    const result = await this.paymentService.refundPayment(id);

    if (!result.success) {
      throw toHttpException(result.error, result.payment);
    }

    return result.payment;
  }

  @Get()
  @ApiListPayments()
  async listPayments(@Query() query: ListPaymentsDto): Promise<Payment[]> {
    return this.paymentService.listPayments({
      status: query.status,
      customerRef: query.customerRef,
      subscriptionId: query.subscriptionId,
    });
  }

  @Get(':id')
  @ApiGetPayment()
  async getPayment(@Param('id', ParseUUIDPipe) id: string): Promise<Payment> {
    try {
      return await this.paymentService.getPayment(id);
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }
}
