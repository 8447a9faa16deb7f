import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import {
  ErrorCode,
  Payment,
  PaymentEngineError,
  toEngineError,
} from '../../../core';

/**
 * Translate an engine error into the matching HTTP exception.
 * The payment, when there is one, travels in the response body.
 */
export function toHttpException(
  error: PaymentEngineError,
  payment: Payment | null = null,
): HttpException {
  const body = {
    code: error.code,
    message: error.message,
    details: error.details,
    ...(payment ? { payment: payment.toPlainObject() } : {}),
  };

  switch (error.code) {
    case ErrorCode.INVALID_ARGUMENT:
      return new BadRequestException(body);

    case ErrorCode.PAYMENT_NOT_FOUND:
    case ErrorCode.SUBSCRIPTION_NOT_FOUND:
      return new NotFoundException(body);

    case ErrorCode.NO_COMMAND_TO_UNDO:
    case ErrorCode.COMMAND_NOT_SUCCESSFUL:
    case ErrorCode.SUBSCRIPTION_NOT_ACTIVE:
    case ErrorCode.NOT_DUE:
    case ErrorCode.INVALID_STATE_TRANSITION:
      return new ConflictException(body);

    case ErrorCode.GATEWAY_DECLINED:
      return new HttpException(body, HttpStatus.PAYMENT_REQUIRED);

    case ErrorCode.INVALID_REFERENCE:
    case ErrorCode.GATEWAY_REFUND_FAILED:
      return new BadGatewayException(body);

    case ErrorCode.INTERNAL:
    default:
      return new InternalServerErrorException({
        code: error.code,
        message: 'Internal error',
      });
  }
}

/**
 * Rethrow anything a service call raised as an HTTP exception
 */
export function rethrowAsHttp(error: unknown): never {
  if (error instanceof HttpException) {
    throw error;
  }
  throw toHttpException(toEngineError(error));
}
