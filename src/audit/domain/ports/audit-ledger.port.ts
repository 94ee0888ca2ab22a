import { EntityManager } from 'typeorm';
import { PagedList } from '../../../utils/pagination/paged-list';
import { PageRequest } from '../../../utils/pagination/page-request';
import { SortInstruction } from '../../../utils/sorting/property-mapping';
import {
  ActivityRecord,
  DocumentActivityRecord,
  MatterActivityRecord,
  MatterDocumentActivityRecord,
  RevisionActivityRecord,
} from '../entities/activity-record.entity';
import { AuditedEntityKind } from '../enums/audited-entity-kind.enum';
import { TransferDirection } from '../enums/transfer-direction.enum';
import {
  ActivitySortField,
  TransferSortField,
} from '../activity-record-property-mapping';

export type EntityActivityQuery = {
  kind:
    | AuditedEntityKind.MATTER
    | AuditedEntityKind.DOCUMENT
    | AuditedEntityKind.REVISION;
  entityId: string;
};

export type TransferActivityQuery = {
  kind: AuditedEntityKind.MATTER_DOCUMENT;
  documentId?: string;
  matterId?: string;
  direction?: TransferDirection;
};

export type ActivityQuery = EntityActivityQuery | TransferActivityQuery;

export type EntityActivityRecord =
  | MatterActivityRecord
  | DocumentActivityRecord
  | RevisionActivityRecord;

/**
 * Append-only store of activity records.
 *
 * Rows are inserted inside the caller's transaction and never updated or
 * deleted; reversing an action is recorded as a new activity.
 */
export abstract class AuditLedger {
  abstract append(record: ActivityRecord, manager: EntityManager): Promise<void>;

  abstract queryByEntity(
    query: EntityActivityQuery,
    page: PageRequest,
    sort: readonly SortInstruction<ActivitySortField>[],
  ): Promise<PagedList<EntityActivityRecord>>;

  abstract queryTransfers(
    query: TransferActivityQuery,
    page: PageRequest,
    sort: readonly SortInstruction<TransferSortField>[],
  ): Promise<PagedList<MatterDocumentActivityRecord>>;
}
