import { DataSource } from 'typeorm';
import { config } from './config';
import { entities } from './models';

export const AppDataSource = new DataSource({
  type: 'postgres',
  url: config.databaseUrl,
  synchronize: config.nodeEnv === 'development', // Auto-sync in dev only
  logging: config.nodeEnv === 'development',
  ssl: config.databaseSsl ? { rejectUnauthorized: false } : false,
  entities,
  subscribers: []
});
