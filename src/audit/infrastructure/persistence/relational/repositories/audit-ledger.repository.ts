import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  EntityManager,
  ObjectLiteral,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
import {
  ActivityRecord,
  MatterDocumentActivityRecord,
} from '../../../../domain/entities/activity-record.entity';
import { AuditedEntityKind } from '../../../../domain/enums/audited-entity-kind.enum';
import {
  AuditLedger,
  EntityActivityQuery,
  EntityActivityRecord,
  TransferActivityQuery,
} from '../../../../domain/ports/audit-ledger.port';
import {
  ActivitySortField,
  TransferSortField,
} from '../../../../domain/activity-record-property-mapping';
import { PagedList } from '../../../../../utils/pagination/paged-list';
import { PageRequest } from '../../../../../utils/pagination/page-request';
import { applySort } from '../../../../../utils/sorting/apply-sort';
import { SortInstruction } from '../../../../../utils/sorting/property-mapping';
import { DocumentActivityEntity } from '../entities/document-activity.entity';
import { MatterActivityEntity } from '../entities/matter-activity.entity';
import { MatterDocumentActivityEntity } from '../entities/matter-document-activity.entity';
import { RevisionActivityEntity } from '../entities/revision-activity.entity';
import { ActivityRecordMapper } from '../mappers/activity-record.mapper';

const ALIAS = 'record';

@Injectable()
export class AuditLedgerRelationalRepository implements AuditLedger {
  constructor(
    @InjectRepository(MatterActivityEntity)
    private readonly matterActivities: Repository<MatterActivityEntity>,
    @InjectRepository(DocumentActivityEntity)
    private readonly documentActivities: Repository<DocumentActivityEntity>,
    @InjectRepository(RevisionActivityEntity)
    private readonly revisionActivities: Repository<RevisionActivityEntity>,
    @InjectRepository(MatterDocumentActivityEntity)
    private readonly transferActivities: Repository<MatterDocumentActivityEntity>,
  ) {}

  async append(record: ActivityRecord, manager: EntityManager): Promise<void> {
    switch (record.kind) {
      case AuditedEntityKind.MATTER:
        await manager.insert(
          MatterActivityEntity,
          ActivityRecordMapper.toPersistence(record, new MatterActivityEntity()),
        );
        return;
      case AuditedEntityKind.DOCUMENT:
        await manager.insert(
          DocumentActivityEntity,
          ActivityRecordMapper.toPersistence(
            record,
            new DocumentActivityEntity(),
          ),
        );
        return;
      case AuditedEntityKind.REVISION:
        await manager.insert(
          RevisionActivityEntity,
          ActivityRecordMapper.toPersistence(
            record,
            new RevisionActivityEntity(),
          ),
        );
        return;
      case AuditedEntityKind.MATTER_DOCUMENT:
        await manager.insert(
          MatterDocumentActivityEntity,
          ActivityRecordMapper.transferToPersistence(record),
        );
        return;
    }
  }

  async queryByEntity(
    query: EntityActivityQuery,
    page: PageRequest,
    sort: readonly SortInstruction<ActivitySortField>[],
  ): Promise<PagedList<EntityActivityRecord>> {
    switch (query.kind) {
      case AuditedEntityKind.MATTER:
        return this.page(
          this.matterActivities
            .createQueryBuilder(ALIAS)
            .where(`${ALIAS}.entityId = :entityId`, { entityId: query.entityId }),
          page,
          sort,
          ActivityRecordMapper.matterToDomain,
        );
      case AuditedEntityKind.DOCUMENT:
        return this.page(
          this.documentActivities
            .createQueryBuilder(ALIAS)
            .where(`${ALIAS}.entityId = :entityId`, { entityId: query.entityId }),
          page,
          sort,
          ActivityRecordMapper.documentToDomain,
        );
      case AuditedEntityKind.REVISION:
        return this.page(
          this.revisionActivities
            .createQueryBuilder(ALIAS)
            .where(`${ALIAS}.entityId = :entityId`, { entityId: query.entityId }),
          page,
          sort,
          ActivityRecordMapper.revisionToDomain,
        );
    }
  }

  async queryTransfers(
    query: TransferActivityQuery,
    page: PageRequest,
    sort: readonly SortInstruction<TransferSortField>[],
  ): Promise<PagedList<MatterDocumentActivityRecord>> {
    const queryBuilder = this.transferActivities.createQueryBuilder(ALIAS);

    if (query.documentId) {
      queryBuilder.andWhere(`${ALIAS}.documentId = :documentId`, {
        documentId: query.documentId,
      });
    }
    if (query.matterId) {
      queryBuilder.andWhere(`${ALIAS}.matterId = :matterId`, {
        matterId: query.matterId,
      });
    }
    if (query.direction) {
      queryBuilder.andWhere(`${ALIAS}.direction = :direction`, {
        direction: query.direction,
      });
    }

    return this.page(
      queryBuilder,
      page,
      sort,
      ActivityRecordMapper.transferToDomain,
    );
  }

  private page<E extends ObjectLiteral, F extends string, R>(
    queryBuilder: SelectQueryBuilder<E>,
    page: PageRequest,
    sort: readonly SortInstruction<F>[],
    toDomain: (entity: E) => R,
  ): Promise<PagedList<R>> {
    // Ledger sequence breaks ties between records written in the same instant
    applySort(queryBuilder, sort, 'id');

    return PagedList.create(
      {
        count: () => queryBuilder.getCount(),
        slice: async (offset, limit) => {
          const entities = await queryBuilder
            .clone()
            .offset(offset)
            .limit(limit)
            .getMany();
          return entities.map(toDomain);
        },
      },
      page.pageNumber,
      page.pageSize,
    );
  }
}
