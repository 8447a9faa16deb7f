import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import {
  PaymentResponseDto,
  RecurringScanResponseDto,
} from '../../dto/payment.dto';

const engineErrorSchema = {
  type: 'object',
  properties: {
    statusCode: { type: 'number', example: 409 },
    code: { type: 'string', example: 'COMMAND_NOT_SUCCESSFUL' },
    message: { type: 'string' },
    details: { type: 'object' },
  },
};

/**
 * Swagger decorator for one-off charges
 */
export const ApiProcessPayment = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Charge a customer',
      description:
        'Runs a ProcessPaymentCommand through the gateway and records the payment',
    }),
    ApiResponse({
      status: 201,
      description: 'Payment completed',
      type: PaymentResponseDto,
    }),
    ApiResponse({
      status: 400,
      description: 'Invalid amount or currency',
      schema: engineErrorSchema,
    }),
    ApiResponse({
      status: 402,
      description: 'Gateway declined the charge; the failed payment is in the body',
      schema: engineErrorSchema,
    }),
  );
};

/**
 * Swagger decorator for refunds
 */
export const ApiRefundPayment = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Refund a payment',
      description:
        'Undoes the command that produced the payment; only completed payments can be refunded',
    }),
    ApiParam({ name: 'id', description: 'Payment id', format: 'uuid' }),
    ApiResponse({
      status: 200,
      description: 'Payment refunded',
      type: PaymentResponseDto,
    }),
    ApiResponse({ status: 404, description: 'Payment not found' }),
    ApiResponse({
      status: 409,
      description: 'Nothing to undo, or the payment never completed',
      schema: engineErrorSchema,
    }),
    ApiResponse({
      status: 502,
      description: 'Gateway refused the refund',
      schema: engineErrorSchema,
    }),
  );
};

/**
 * Swagger decorator for manual recurring billing runs
 */
export const ApiProcessRecurring = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Charge all due subscriptions',
      description:
        'Runs one scheduler tick: every active subscription due at `now` is charged once',
    }),
    ApiResponse({
      status: 200,
      description: 'Tick finished',
      type: RecurringScanResponseDto,
    }),
  );
};

export const ApiListPayments = () => {
  return applyDecorators(
    ApiOperation({ summary: 'List payments, newest first' }),
    ApiResponse({ status: 200, type: [PaymentResponseDto] }),
  );
};

export const ApiGetPayment = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Get payment by id' }),
    ApiParam({ name: 'id', description: 'Payment id', format: 'uuid' }),
    ApiResponse({ status: 200, type: PaymentResponseDto }),
    ApiResponse({ status: 404, description: 'Payment not found' }),
  );
};
