import { Module } from '@nestjs/common';
import { RelationalAuditPersistenceModule } from '../audit/infrastructure/persistence/relational/relational-persistence.module';
import { UnitOfWorkModule } from '../database/unit-of-work.module';
import { DocumentsModule } from '../documents/documents.module';
import { RevisionLifecycleDomainService } from './domain/services/revision-lifecycle.domain.service';
import { RelationalRevisionPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';

@Module({
  imports: [
    DocumentsModule,
    RelationalRevisionPersistenceModule,
    RelationalAuditPersistenceModule,
    UnitOfWorkModule,
  ],
  providers: [RevisionLifecycleDomainService],
  exports: [RevisionLifecycleDomainService, RelationalRevisionPersistenceModule],
})
export class RevisionsModule {}
