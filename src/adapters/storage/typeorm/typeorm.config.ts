import { DataSource } from 'typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { CheckoutEntity, PaymentEntity, OrderEntity } from './entities';

/**
 * TypeORM configuration for the checkout, payment and order tables
 */
export const createTypeORMConfig = (
  options?: Partial<PostgresConnectionOptions>,
): PostgresConnectionOptions => {
  const defaultConfig: PostgresConnectionOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'checkout_sync',
    password: process.env.DB_PASSWORD || 'checkout_sync',
    database: process.env.DB_NAME || 'checkout_sync',
    entities: [CheckoutEntity, PaymentEntity, OrderEntity],
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    subscribers: [],
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
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<PostgresConnectionOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
