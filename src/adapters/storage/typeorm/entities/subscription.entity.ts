import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { BillingInterval, SubscriptionStatus } from '../../../../core';
import { bigintTransformer, epochMillisTransformer } from './column-transformers';

/**
 * TypeORM entity for Subscription
 */
@Entity('subscriptions')
@Index(['status', 'nextPaymentDate'])
@Index(['customerRef'])
export class SubscriptionEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'bigint', transformer: bigintTransformer })
  amount!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ name: 'customer_ref', type: 'varchar' })
  customerRef!: string;

  @Column({ type: 'simple-enum', enum: BillingInterval })
  interval!: BillingInterval;

  @Column({
    type: 'simple-enum',
    enum: SubscriptionStatus,
    default: SubscriptionStatus.ACTIVE,
  })
  status!: SubscriptionStatus;

  @Column({
    name: 'next_payment_at',
    type: 'bigint',
    transformer: epochMillisTransformer,
  })
  nextPaymentDate!: Date;

  @Column({ name: 'start_date', type: 'bigint', transformer: epochMillisTransformer })
  startDate!: Date;

  @Column({ name: 'created_at', type: 'bigint', transformer: epochMillisTransformer })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'bigint', transformer: epochMillisTransformer })
  updatedAt!: Date;
}
