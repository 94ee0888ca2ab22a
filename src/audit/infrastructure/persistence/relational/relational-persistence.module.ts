import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditLedger } from '../../../domain/ports/audit-ledger.port';
import { DocumentActivityEntity } from './entities/document-activity.entity';
import { MatterActivityEntity } from './entities/matter-activity.entity';
import { MatterDocumentActivityEntity } from './entities/matter-document-activity.entity';
import { RevisionActivityEntity } from './entities/revision-activity.entity';
import { AuditLedgerRelationalRepository } from './repositories/audit-ledger.repository';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      MatterActivityEntity,
      DocumentActivityEntity,
      RevisionActivityEntity,
      MatterDocumentActivityEntity,
    ]),
  ],
  providers: [
    {
      provide: AuditLedger,
      useClass: AuditLedgerRelationalRepository,
    },
  ],
  exports: [AuditLedger],
})
export class RelationalAuditPersistenceModule {}
