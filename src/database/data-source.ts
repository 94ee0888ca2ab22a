import 'reflect-metadata';
import 'dotenv/config';
import path from 'path';
import { DataSource } from 'typeorm';

// Used by the TypeORM CLI for migrations; the application builds its
// connection through TypeOrmConfigService.
export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  host: process.env.DATABASE_HOST,
  port: process.env.DATABASE_PORT
    ? parseInt(process.env.DATABASE_PORT, 10)
    : 5432,
  username: process.env.DATABASE_USERNAME,
  password: process.env.DATABASE_PASSWORD,
  database: process.env.DATABASE_NAME || 'matter_ledger',
  synchronize: false,
  dropSchema: false,
  logging: process.env.NODE_ENV !== 'production',
  entities: [
    path.join(
      __dirname,
      '..',
      '**',
      'relational',
      'entities',
      '*.entity{.ts,.js}',
    ),
  ],
  migrations: [path.join(__dirname, 'migrations', '*{.ts,.js}')],
  ssl:
    process.env.DATABASE_SSL_ENABLED === 'true'
      ? {
          rejectUnauthorized:
            process.env.DATABASE_REJECT_UNAUTHORIZED === 'true',
          ca: process.env.DATABASE_CA,
          key: process.env.DATABASE_KEY,
          cert: process.env.DATABASE_CERT,
        }
      : undefined,
});
