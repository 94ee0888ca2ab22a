import { Module } from '@nestjs/common';
import { RelationalAuditPersistenceModule } from '../audit/infrastructure/persistence/relational/relational-persistence.module';
import { UnitOfWorkModule } from '../database/unit-of-work.module';
import { MatterLifecycleDomainService } from './domain/services/matter-lifecycle.domain.service';
import { RelationalMatterPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';

@Module({
  imports: [
    RelationalMatterPersistenceModule,
    RelationalAuditPersistenceModule,
    UnitOfWorkModule,
  ],
  providers: [MatterLifecycleDomainService],
  exports: [MatterLifecycleDomainService, RelationalMatterPersistenceModule],
})
export class MattersModule {}
