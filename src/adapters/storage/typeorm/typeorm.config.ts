import { DataSource, DataSourceOptions } from 'typeorm';
import { PaymentEntity, SubscriptionEntity } from './entities';

export const CHARGEFLOW_ENTITIES = [PaymentEntity, SubscriptionEntity];

/**
 * TypeORM configuration for ChargeFlow
 * Postgres from DB_* variables; options override any field
 */
export const createTypeORMConfig = (
  options?: Partial<DataSourceOptions>,
): DataSourceOptions => {
  const defaultConfig: DataSourceOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'chargeflow',
    password: process.env.DB_PASSWORD || 'chargeflow',
    database: process.env.DB_NAME || 'chargeflow',
    entities: CHARGEFLOW_ENTITIES,
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
  } as DataSourceOptions;
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<DataSourceOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
