/**
 * TypeORM Storage Adapter (PostgreSQL in production)
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  CHARGEFLOW_ENTITIES,
} from './typeorm.config';
export * from './entities';
