import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import {
  KeyedMutex,
  Money,
  NotFoundError,
  Payment,
  PaymentFilter,
  PaymentStatus,
  StorageAdapter,
  StorageStatistics,
  Subscription,
  SubscriptionFilter,
  SubscriptionLockContext,
  SubscriptionStatus,
  emptyPaymentStatusCounts,
  emptySubscriptionStatusCounts,
} from '../../../core';
import { PaymentEntity, SubscriptionEntity } from './entities';

/**
 * Drivers that understand SELECT ... FOR UPDATE
 */
const ROW_LOCK_DRIVERS = new Set([
  'postgres',
  'cockroachdb',
  'mysql',
  'mariadb',
  'mssql',
  'oracle',
]);

/**
 * Single-connection drivers serialize every locked update under this key
 */
const GLOBAL_LOCK_KEY = '*';

/**
 * TypeORM implementation of StorageAdapter
 * PostgreSQL in production; any TypeORM driver works
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private paymentRepo: Repository<PaymentEntity>;
  private subscriptionRepo: Repository<SubscriptionEntity>;
  private readonly locks = new KeyedMutex();
  private readonly supportsRowLocks: boolean;

  constructor(private readonly dataSource: DataSource) {
    this.paymentRepo = dataSource.getRepository(PaymentEntity);
    this.subscriptionRepo = dataSource.getRepository(SubscriptionEntity);
    this.supportsRowLocks = ROW_LOCK_DRIVERS.has(dataSource.options.type);
  }

  /**
   * Payment Management
   */

  async savePayment(payment: Payment): Promise<Payment> {
    await this.paymentRepo.save(this.mapPaymentToEntity(payment));
    return payment;
  }

  async findPayment(id: string): Promise<Payment | null> {
    const entity = await this.paymentRepo.findOne({ where: { id } });
    return entity ? this.mapPaymentEntityToDomain(entity) : null;
  }

  async listPayments(filter: PaymentFilter = {}): Promise<Payment[]> {
    const where: FindOptionsWhere<PaymentEntity> = {};
    if (filter.status) {
      where.status = filter.status;
    }
    if (filter.customerRef) {
      where.customerRef = filter.customerRef;
    }
    if (filter.subscriptionId) {
      where.subscriptionId = filter.subscriptionId;
    }

    const entities = await this.paymentRepo.find({
      where,
      order: { createdAt: 'DESC', id: 'ASC' },
    });
    return entities.map((e) => this.mapPaymentEntityToDomain(e));
  }

  /**
   * Subscription Management
   */

  async saveSubscription(subscription: Subscription): Promise<Subscription> {
    await this.subscriptionRepo.save(this.mapSubscriptionToEntity(subscription));
    return subscription;
  }

  async findSubscription(id: string): Promise<Subscription | null> {
    const entity = await this.subscriptionRepo.findOne({ where: { id } });
    return entity ? this.mapSubscriptionEntityToDomain(entity) : null;
  }

  async listSubscriptions(
    filter: SubscriptionFilter = {},
  ): Promise<Subscription[]> {
    const where: FindOptionsWhere<SubscriptionEntity> = {};
    if (filter.status) {
      where.status = filter.status;
    }
    if (filter.customerRef) {
      where.customerRef = filter.customerRef;
    }

    const entities = await this.subscriptionRepo.find({
      where,
      order: { createdAt: 'DESC', id: 'ASC' },
    });
    return entities.map((e) => this.mapSubscriptionEntityToDomain(e));
  }

  async findDueSubscriptions(
    threshold: Date,
    limit?: number,
  ): Promise<Subscription[]> {
    const qb = this.subscriptionRepo
      .createQueryBuilder('s')
      .where('s.status = :status', { status: SubscriptionStatus.ACTIVE })
      .andWhere('s.nextPaymentDate <= :threshold', {
        threshold: threshold.getTime(),
      })
      .orderBy('s.nextPaymentDate', 'ASC')
      .addOrderBy('s.id', 'ASC');

    if (limit) {
      qb.limit(limit);
    }

    const entities = await qb.getMany();
    return entities.map((e) => this.mapSubscriptionEntityToDomain(e));
  }

  async withSubscriptionLock<T>(
    id: string,
    work: (
      subscription: Subscription,
      context: SubscriptionLockContext,
    ) => Promise<T>,
  ): Promise<T> {
    const key = this.supportsRowLocks ? id : GLOBAL_LOCK_KEY;

    return this.locks.runExclusive(key, () =>
      this.withTransaction(async (manager) => {
        // Row lock keeps other processes out for the whole read-modify-write
        const entity = await manager.findOne(SubscriptionEntity, {
          where: { id },
          lock: this.supportsRowLocks ? { mode: 'pessimistic_write' } : undefined,
        });

        if (!entity) {
          throw new NotFoundError('Subscription', id);
        }

        const subscription = this.mapSubscriptionEntityToDomain(entity);
        const result = await work(subscription, {
          // Savepoint: a failed payment write leaves the outer transaction usable
          savePayment: async (payment) => {
            await manager.transaction((inner) =>
              inner.save(this.mapPaymentToEntity(payment)),
            );
            return payment;
          },
        });
        await manager.save(this.mapSubscriptionToEntity(subscription));
        return result;
      }),
    );
  }

  async withTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async getStatistics(): Promise<StorageStatistics> {
    const paymentsByStatus = emptyPaymentStatusCounts();
    const subscriptionsByStatus = emptySubscriptionStatusCounts();

    const [paymentCount, subscriptionCount] = await Promise.all([
      this.paymentRepo.count(),
      this.subscriptionRepo.count(),
      ...Object.values(PaymentStatus).map(async (status) => {
        paymentsByStatus[status] = await this.paymentRepo.count({
          where: { status },
        });
      }),
      ...Object.values(SubscriptionStatus).map(async (status) => {
        subscriptionsByStatus[status] = await this.subscriptionRepo.count({
          where: { status },
        });
      }),
    ]);

    return {
      paymentCount,
      subscriptionCount,
      paymentsByStatus,
      subscriptionsByStatus,
    };
  }

  /**
   * Private Mapping Methods
   */

  private mapPaymentEntityToDomain(entity: PaymentEntity): Payment {
    return new Payment(
      entity.id,
      new Money(Number(entity.amount), entity.currency),
      entity.customerRef,
      entity.status,
      entity.transactionRef,
      entity.subscriptionId,
      entity.createdAt,
      entity.updatedAt,
      entity.paidAt,
      entity.refundRef,
    );
  }

  private mapPaymentToEntity(payment: Payment): PaymentEntity {
    return this.paymentRepo.create({
      id: payment.id,
      amount: payment.money.amount,
      currency: payment.currency,
      status: payment.status,
      transactionRef: payment.transactionRef,
      refundRef: payment.refundRef,
      customerRef: payment.customerRef,
      subscriptionId: payment.subscriptionId,
      createdAt: payment.createdAt,
      updatedAt: payment.updatedAt,
      paidAt: payment.paidAt,
    });
  }

  private mapSubscriptionEntityToDomain(entity: SubscriptionEntity): Subscription {
    return new Subscription(
      entity.id,
      new Money(Number(entity.amount), entity.currency),
      entity.customerRef,
      entity.interval,
      entity.status,
      entity.nextPaymentDate,
      entity.startDate,
      entity.createdAt,
      entity.updatedAt,
    );
  }

  private mapSubscriptionToEntity(subscription: Subscription): SubscriptionEntity {
    return this.subscriptionRepo.create({
      id: subscription.id,
      amount: subscription.money.amount,
      currency: subscription.currency,
      customerRef: subscription.customerRef,
      interval: subscription.interval,
      status: subscription.status,
      nextPaymentDate: subscription.nextPaymentDate,
      startDate: subscription.startDate,
      createdAt: subscription.createdAt,
      updatedAt: subscription.updatedAt,
    });
  }
}
