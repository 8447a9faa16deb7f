import {
  IsString,
  IsNumber,
  IsNotEmpty,
  IsOptional,
  IsUUID,
  IsEnum,
  IsPositive,
  IsDateString,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { PaymentStatus } from '../../core/domain/enums';

/**
 * DTO for a one-off charge
 */
export class ProcessPaymentDto {
  @ApiProperty({
    description: 'Amount in major currency units',
    example: 99.99,
    minimum: 0.01,
  })
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  amount!: number;

  @ApiPropertyOptional({
    description: 'ISO 4217 currency code',
    example: 'USD',
    default: 'USD',
    pattern: '^[A-Za-z]{3}$',
  })
  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z]{3}$/, {
    message: 'currency must be a 3-letter ISO 4217 code',
  })
  currency?: string;

  @ApiProperty({
    description: 'Customer reference (e.g. email or customer id)',
    example: 'customer@example.com',
    minLength: 1,
    maxLength: 255,
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 255)
  customerRef!: string;
}

/**
 * DTO for listing payments
 */
export class ListPaymentsDto {
  @ApiPropertyOptional({
    description: 'Filter by status',
    enum: PaymentStatus,
  })
  @IsOptional()
  @IsEnum(PaymentStatus)
  status?: PaymentStatus;

  @ApiPropertyOptional({
    description: 'Filter by customer reference',
    example: 'customer@example.com',
  })
  @IsOptional()
  @IsString()
  customerRef?: string;

  @ApiPropertyOptional({
    description: 'Filter by originating subscription',
  })
  @IsOptional()
  @IsUUID()
  subscriptionId?: string;
}

/**
 * DTO for running recurring billing at a given instant
 */
export class ProcessAtDto {
  @ApiPropertyOptional({
    description: 'Instant to evaluate due dates against, defaults to now',
    example: '2025-02-01T00:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  now?: string;
}

/**
 * Response DTO for a payment
 */
export class PaymentResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ description: 'Amount in major units', example: 99.99 })
  amount!: number;

  @ApiProperty({ description: 'Amount in minor units', example: 9999 })
  amountMinor!: number;

  @ApiProperty({ example: 'USD' })
  currency!: string;

  @ApiProperty({ enum: PaymentStatus, example: PaymentStatus.COMPLETED })
  status!: PaymentStatus;

  @ApiPropertyOptional({ example: 'txn_4f1c2a9b7d3e5f60', nullable: true })
  transactionRef!: string | null;

  @ApiPropertyOptional({ example: 'rfnd_9a8b7c6d5e4f3a2b', nullable: true })
  refundRef!: string | null;

  @ApiProperty({ example: 'customer@example.com' })
  customerRef!: string;

  @ApiPropertyOptional({ format: 'uuid', nullable: true })
  subscriptionId!: string | null;

  @ApiProperty({ type: String, format: 'date-time' })
  createdAt!: Date;

  @ApiProperty({ type: String, format: 'date-time' })
  updatedAt!: Date;

  @ApiPropertyOptional({ type: String, format: 'date-time', nullable: true })
  paidAt!: Date | null;
}

/**
 * Response DTO for a manual recurring billing run
 */
export class RecurringScanResponseDto {
  @ApiProperty({ example: 2 })
  processed!: number;

  @ApiProperty({ type: [PaymentResponseDto] })
  payments!: PaymentResponseDto[];

  @ApiProperty({
    description: 'Per-subscription failures',
    example: [
      {
        subscriptionId: '1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed',
        code: 'GATEWAY_DECLINED',
        message: 'Charge declined: insufficient funds or card declined',
        paymentId: '6ec0bd7f-11c0-43da-975e-2a8ad9ebae0b',
      },
    ],
  })
  errors!: Array<{
    subscriptionId: string | null;
    code: string;
    message: string;
    paymentId: string | null;
  }>;
}
