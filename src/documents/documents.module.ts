import { Module } from '@nestjs/common';
import { RelationalAuditPersistenceModule } from '../audit/infrastructure/persistence/relational/relational-persistence.module';
import { UnitOfWorkModule } from '../database/unit-of-work.module';
import { MattersModule } from '../matters/matters.module';
import { RelationalRevisionPersistenceModule } from '../revisions/infrastructure/persistence/relational/relational-persistence.module';
import { DocumentLifecycleDomainService } from './domain/services/document-lifecycle.domain.service';
import { DocumentTransferDomainService } from './domain/services/document-transfer.domain.service';
import { RelationalDocumentPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';

@Module({
  imports: [
    MattersModule,
    RelationalDocumentPersistenceModule,
    RelationalRevisionPersistenceModule,
    RelationalAuditPersistenceModule,
    UnitOfWorkModule,
  ],
  providers: [DocumentLifecycleDomainService, DocumentTransferDomainService],
  exports: [
    DocumentLifecycleDomainService,
    DocumentTransferDomainService,
    RelationalDocumentPersistenceModule,
  ],
})
export class DocumentsModule {}
