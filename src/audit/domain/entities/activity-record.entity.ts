import { NullableType } from '../../../utils/types/nullable.type';
import { Activity } from '../enums/activity.enum';
import {
  ACTIVITIES_BY_ENTITY,
  AuditedEntityKind,
} from '../enums/audited-entity-kind.enum';
import { TransferDirection } from '../enums/transfer-direction.enum';

type ActivityRecordBase<K extends AuditedEntityKind> = {
  readonly kind: K;
  // Ledger sequence number; null until the record has been appended
  readonly id: NullableType<number>;
  readonly entityId: string;
  readonly activity: Activity;
  readonly userId: string;
  readonly createdAt: Date;
};

export type MatterActivityRecord = ActivityRecordBase<AuditedEntityKind.MATTER>;

export type DocumentActivityRecord =
  ActivityRecordBase<AuditedEntityKind.DOCUMENT>;

export type RevisionActivityRecord =
  ActivityRecordBase<AuditedEntityKind.REVISION>;

/**
 * One half of a cross-matter transfer. `entityId` is the transferred
 * document; `matterId` is the matter this half belongs to.
 */
export type MatterDocumentActivityRecord =
  ActivityRecordBase<AuditedEntityKind.MATTER_DOCUMENT> & {
    readonly matterId: string;
    readonly counterpartMatterId: string;
    readonly documentId: string;
    readonly direction: TransferDirection;
  };

export type ActivityRecord =
  | MatterActivityRecord
  | DocumentActivityRecord
  | RevisionActivityRecord
  | MatterDocumentActivityRecord;

export function isActivityAllowed(
  kind: AuditedEntityKind,
  activity: Activity,
): boolean {
  return ACTIVITIES_BY_ENTITY[kind].includes(activity);
}

function assertActivity(kind: AuditedEntityKind, activity: Activity): void {
  if (!isActivityAllowed(kind, activity)) {
    throw new RangeError(`${activity} is not a ${kind} activity`);
  }
}

/**
 * Builds frozen activity records. Records are never modified after this
 * point; the ledger only ever inserts them. Each record holds its own copy
 * of the timestamp, so changing the caller's Date leaves it untouched.
 */
export class ActivityRecords {
  static forMatter(
    matterId: string,
    activity: Activity,
    userId: string,
    createdAt: Date = new Date(),
  ): MatterActivityRecord {
    assertActivity(AuditedEntityKind.MATTER, activity);
    return Object.freeze({
      kind: AuditedEntityKind.MATTER,
      id: null,
      entityId: matterId,
      activity,
      userId,
      createdAt: new Date(createdAt.getTime()),
    });
  }

  static forDocument(
    documentId: string,
    activity: Activity,
    userId: string,
    createdAt: Date = new Date(),
  ): DocumentActivityRecord {
    assertActivity(AuditedEntityKind.DOCUMENT, activity);
    return Object.freeze({
      kind: AuditedEntityKind.DOCUMENT,
      id: null,
      entityId: documentId,
      activity,
      userId,
      createdAt: new Date(createdAt.getTime()),
    });
  }

  static forRevision(
    revisionId: string,
    activity: Activity,
    userId: string,
    createdAt: Date = new Date(),
  ): RevisionActivityRecord {
    assertActivity(AuditedEntityKind.REVISION, activity);
    return Object.freeze({
      kind: AuditedEntityKind.REVISION,
      id: null,
      entityId: revisionId,
      activity,
      userId,
      createdAt: new Date(createdAt.getTime()),
    });
  }

  /**
   * The FROM record (source matter) and TO record (target matter) of one
   * transfer. Both share the document id and timestamp.
   */
  static transferPair(params: {
    sourceMatterId: string;
    targetMatterId: string;
    documentId: string;
    activity: Activity;
    userId: string;
    createdAt?: Date;
  }): [MatterDocumentActivityRecord, MatterDocumentActivityRecord] {
    assertActivity(AuditedEntityKind.MATTER_DOCUMENT, params.activity);
    const createdAt = params.createdAt ?? new Date();

    const half = (
      matterId: string,
      counterpartMatterId: string,
      direction: TransferDirection,
    ): MatterDocumentActivityRecord =>
      Object.freeze({
        kind: AuditedEntityKind.MATTER_DOCUMENT,
        id: null,
        entityId: params.documentId,
        documentId: params.documentId,
        matterId,
        counterpartMatterId,
        direction,
        activity: params.activity,
        userId: params.userId,
        createdAt: new Date(createdAt.getTime()),
      });

    return [
      half(
        params.sourceMatterId,
        params.targetMatterId,
        TransferDirection.FROM,
      ),
      half(params.targetMatterId, params.sourceMatterId, TransferDirection.TO),
    ];
  }
}
