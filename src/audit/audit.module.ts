import { Module } from '@nestjs/common';
import { RelationalDocumentPersistenceModule } from '../documents/infrastructure/persistence/relational/relational-persistence.module';
import { RelationalMatterPersistenceModule } from '../matters/infrastructure/persistence/relational/relational-persistence.module';
import { RelationalRevisionPersistenceModule } from '../revisions/infrastructure/persistence/relational/relational-persistence.module';
import { AuditQueryService } from './audit-query.service';
import { RelationalAuditPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';

@Module({
  imports: [
    RelationalAuditPersistenceModule,
    RelationalMatterPersistenceModule,
    RelationalDocumentPersistenceModule,
    RelationalRevisionPersistenceModule,
  ],
  providers: [AuditQueryService],
  exports: [AuditQueryService, RelationalAuditPersistenceModule],
})
export class AuditModule {}
