import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import configuration from './config/configuration';

config();

const { database } = configuration();

/** Connection used by the typeorm CLI; mirrors the app's database settings. */
export const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: database.host,
  port: database.port,
  username: database.username,
  password: database.password,
  database: database.name,
  entities: ['dist/**/*.entity.js'],
  migrations: ['dist/migration/*.js'],
  migrationsTableName: 'screening_migrations',
  synchronize: false,
};

export default new DataSource(dataSourceOptions);
