import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import path from 'path';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', {
      infer: true,
    });
    const isProduction =
      this.configService.get('app.nodeEnv', { infer: true }) === 'production';

    const shared = {
      synchronize: database.synchronize,
      migrationsRun: database.migrationsRun,
      dropSchema: false,
      logging: isProduction ? false : database.logging,
      autoLoadEntities: true,
      migrations: [path.join(__dirname, 'migrations', '*{.ts,.js}')],
    };

    if (database.type === 'better-sqlite3') {
      return {
        ...shared,
        type: 'better-sqlite3',
        database: database.name,
      };
    }

    return {
      ...shared,
      type: 'postgres',
      url: database.url,
      host: database.host,
      port: database.port,
      username: database.username,
      password: database.password,
      database: database.name,
      poolSize: database.maxConnections,
      ssl: database.sslEnabled
        ? {
            rejectUnauthorized: database.rejectUnauthorized,
            ca: database.ca,
            key: database.key,
            cert: database.cert,
          }
        : undefined,
    };
  }
}
