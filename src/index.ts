import 'reflect-metadata';

export { AppModule } from './app.module';

export * from './config/config.type';
export * from './config/app-config.type';
export * from './config/pagination-config.type';
export * from './database/config/database-config.type';
export * from './files/config/file-storage-config.type';

export * from './database/operation-context';
export * from './database/unit-of-work';
export * from './database/unit-of-work.errors';
export * from './database/unit-of-work.factory';
export * from './database/unit-of-work.module';

export * from './utils/results/operation-result';
export * from './utils/pagination/paged-list';
export * from './utils/pagination/page-params.dto';
export * from './utils/sorting/property-mapping';
export * from './utils/validation/validation-gate';

export * from './audit/audit.module';
export * from './audit/audit-query.service';
export * from './audit/domain/entities/activity-record.entity';
export * from './audit/domain/enums/activity.enum';
export * from './audit/domain/enums/audited-entity-kind.enum';
export * from './audit/domain/enums/transfer-direction.enum';
export * from './audit/domain/ports/audit-ledger.port';
export * from './audit/dto/activity-record-response.dto';

export * from './matters/matters.module';
export * from './matters/domain/entities/matter.entity';
export * from './matters/domain/services/matter-lifecycle.domain.service';
export * from './matters/dto/create-matter.dto';
export * from './matters/dto/update-matter.dto';
export * from './matters/dto/list-matters.dto';
export * from './matters/dto/matter-response.dto';

export * from './documents/documents.module';
export * from './documents/domain/entities/document.entity';
export * from './documents/domain/enums/transfer-mode.enum';
export * from './documents/domain/services/document-lifecycle.domain.service';
export * from './documents/domain/services/document-transfer.domain.service';
export * from './documents/domain/utils/document-check-state.util';
export * from './documents/dto/create-document.dto';
export * from './documents/dto/update-document.dto';
export * from './documents/dto/list-documents.dto';
export * from './documents/dto/document-response.dto';

export * from './revisions/revisions.module';
export * from './revisions/domain/entities/revision.entity';
export * from './revisions/domain/services/revision-lifecycle.domain.service';
export * from './revisions/dto/list-revisions.dto';
export * from './revisions/dto/update-revision.dto';
export * from './revisions/dto/revision-response.dto';

export * from './files/domain/ports/file-storage.port';
export * from './files/domain/ports/virus-scanner.port';
