import {
  IsString,
  IsNumber,
  IsNotEmpty,
  IsOptional,
  IsEnum,
  IsPositive,
  IsDateString,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { BillingInterval, SubscriptionStatus } from '../../core/domain/enums';

/**
 * DTO for creating a subscription
 */
export class CreateSubscriptionDto {
  @ApiProperty({
    description: 'Amount per billing cycle in major units',
    example: 29.99,
  })
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  amount!: number;

  @ApiPropertyOptional({
    description: 'ISO 4217 currency code',
    example: 'USD',
    default: 'USD',
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
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 255)
  customerRef!: string;

  @ApiProperty({
    description: 'Billing interval',
    enum: BillingInterval,
    example: BillingInterval.MONTHLY,
  })
  @IsEnum(BillingInterval)
  interval!: BillingInterval;

  @ApiPropertyOptional({
    description: 'First due date, defaults to now',
    example: '2025-01-31T09:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  nextPaymentDate?: string;
}

/**
 * DTO for listing subscriptions
 */
export class ListSubscriptionsDto {
  @ApiPropertyOptional({
    description: 'Filter by status',
    enum: SubscriptionStatus,
  })
  @IsOptional()
  @IsEnum(SubscriptionStatus)
  status?: SubscriptionStatus;

  @ApiPropertyOptional({
    description: 'Filter by customer reference',
  })
  @IsOptional()
  @IsString()
  customerRef?: string;
}

/**
 * Response DTO for a subscription
 */
export class SubscriptionResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 29.99 })
  amount!: number;

  @ApiProperty({ example: 2999 })
  amountMinor!: number;

  @ApiProperty({ example: 'USD' })
  currency!: string;

  @ApiProperty({ example: 'customer@example.com' })
  customerRef!: string;

  @ApiProperty({ enum: BillingInterval })
  interval!: BillingInterval;

  @ApiProperty({ enum: SubscriptionStatus })
  status!: SubscriptionStatus;

  @ApiProperty({ type: String, format: 'date-time' })
  nextPaymentDate!: Date;

  @ApiProperty({ type: String, format: 'date-time' })
  startDate!: Date;

  @ApiProperty({ type: String, format: 'date-time' })
  createdAt!: Date;

  @ApiProperty({ type: String, format: 'date-time' })
  updatedAt!: Date;
}
