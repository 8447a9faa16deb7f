import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { PaymentStatus } from '../../../../core';
import { bigintTransformer, epochMillisTransformer } from './column-transformers';

/**
 * TypeORM entity for Payment
 */
@Entity('payments')
@Index(['status'])
@Index(['customerRef'])
@Index(['subscriptionId'])
@Index(['createdAt'])
export class PaymentEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  /**
   * Minor units
   */
  @Column({ type: 'bigint', transformer: bigintTransformer })
  amount!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({
    type: 'simple-enum',
    enum: PaymentStatus,
    default: PaymentStatus.PENDING,
  })
  status!: PaymentStatus;

  @Column({ name: 'transaction_ref', type: 'varchar', nullable: true })
  transactionRef!: string | null;

  @Column({ name: 'refund_ref', type: 'varchar', nullable: true })
  refundRef!: string | null;

  @Column({ name: 'customer_ref', type: 'varchar' })
  customerRef!: string;

  @Column({ name: 'subscription_id', type: 'varchar', length: 36, nullable: true })
  subscriptionId!: string | null;

  @Column({ name: 'created_at', type: 'bigint', transformer: epochMillisTransformer })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'bigint', transformer: epochMillisTransformer })
  updatedAt!: Date;

  @Column({
    name: 'paid_at',
    type: 'bigint',
    nullable: true,
    transformer: epochMillisTransformer,
  })
  paidAt!: Date | null;
}
