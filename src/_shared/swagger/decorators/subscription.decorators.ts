import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import { SubscriptionResponseDto } from '../../dto/subscription.dto';
import { PaymentResponseDto } from '../../dto/payment.dto';

export const ApiCreateSubscription = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create a subscription',
      description: 'Starts an active recurring charge, first due at nextPaymentDate',
    }),
    ApiResponse({ status: 201, type: SubscriptionResponseDto }),
    ApiResponse({ status: 400, description: 'Invalid amount, currency or interval' }),
  );
};

export const ApiListSubscriptions = () => {
  return applyDecorators(
    ApiOperation({ summary: 'List subscriptions, newest first' }),
    ApiResponse({ status: 200, type: [SubscriptionResponseDto] }),
  );
};

export const ApiGetSubscription = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Get subscription by id' }),
    ApiParam({ name: 'id', description: 'Subscription id', format: 'uuid' }),
    ApiResponse({ status: 200, type: SubscriptionResponseDto }),
    ApiResponse({ status: 404, description: 'Subscription not found' }),
  );
};

/**
 * Swagger decorator for pause / resume / cancel
 */
export const ApiSubscriptionLifecycle = (action: 'pause' | 'resume' | 'cancel') => {
  const summaries = {
    pause: 'Pause a subscription',
    resume: 'Resume a paused subscription',
    cancel: 'Cancel a subscription',
  };

  return applyDecorators(
    ApiOperation({ summary: summaries[action] }),
    ApiParam({ name: 'id', description: 'Subscription id', format: 'uuid' }),
    ApiResponse({ status: 200, type: SubscriptionResponseDto }),
    ApiResponse({ status: 404, description: 'Subscription not found' }),
    ApiResponse({
      status: 409,
      description: 'Transition not allowed from the current status',
    }),
  );
};

export const ApiProcessSubscription = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Charge one subscription now',
      description: 'Fails when the subscription is not active or not yet due',
    }),
    ApiParam({ name: 'id', description: 'Subscription id', format: 'uuid' }),
    ApiResponse({ status: 201, type: PaymentResponseDto }),
    ApiResponse({ status: 402, description: 'Gateway declined the charge' }),
    ApiResponse({ status: 409, description: 'Not active or not due' }),
  );
};
