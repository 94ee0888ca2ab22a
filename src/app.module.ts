import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import appConfig from './config/app.config';
import paginationConfig from './config/pagination.config';
import databaseConfig from './database/config/database.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { UnitOfWorkModule } from './database/unit-of-work.module';
import fileStorageConfig from './files/config/file-storage.config';
import { AuditModule } from './audit/audit.module';
import { DocumentsModule } from './documents/documents.module';
import { MattersModule } from './matters/matters.module';
import { RevisionsModule } from './revisions/revisions.module';

/**
 * Root module for hosts embedding the lifecycle engine. Exposes the domain
 * services of every feature module; the host supplies transport and
 * authentication.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, paginationConfig, fileStorageConfig],
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
    }),
    UnitOfWorkModule,
    MattersModule,
    DocumentsModule,
    RevisionsModule,
    AuditModule,
  ],
  exports: [
    UnitOfWorkModule,
    MattersModule,
    DocumentsModule,
    RevisionsModule,
    AuditModule,
  ],
})
export class AppModule {}
