import {
  DocumentActivityRecord,
  MatterActivityRecord,
  MatterDocumentActivityRecord,
  RevisionActivityRecord,
} from '../../../../domain/entities/activity-record.entity';
import { AuditedEntityKind } from '../../../../domain/enums/audited-entity-kind.enum';
import { DocumentActivityEntity } from '../entities/document-activity.entity';
import { MatterActivityEntity } from '../entities/matter-activity.entity';
import { MatterDocumentActivityEntity } from '../entities/matter-document-activity.entity';
import { RevisionActivityEntity } from '../entities/revision-activity.entity';

type EntityActivityRow =
  | MatterActivityEntity
  | DocumentActivityEntity
  | RevisionActivityEntity;

type EntityActivityRecord =
  | MatterActivityRecord
  | DocumentActivityRecord
  | RevisionActivityRecord;

export class ActivityRecordMapper {
  static matterToDomain(entity: MatterActivityEntity): MatterActivityRecord {
    return Object.freeze({
      kind: AuditedEntityKind.MATTER,
      ...ActivityRecordMapper.commonFields(entity),
    });
  }

  static documentToDomain(
    entity: DocumentActivityEntity,
  ): DocumentActivityRecord {
    return Object.freeze({
      kind: AuditedEntityKind.DOCUMENT,
      ...ActivityRecordMapper.commonFields(entity),
    });
  }

  static revisionToDomain(
    entity: RevisionActivityEntity,
  ): RevisionActivityRecord {
    return Object.freeze({
      kind: AuditedEntityKind.REVISION,
      ...ActivityRecordMapper.commonFields(entity),
    });
  }

  static transferToDomain(
    entity: MatterDocumentActivityEntity,
  ): MatterDocumentActivityRecord {
    return Object.freeze({
      kind: AuditedEntityKind.MATTER_DOCUMENT,
      id: entity.id,
      entityId: entity.documentId,
      documentId: entity.documentId,
      matterId: entity.matterId,
      counterpartMatterId: entity.counterpartMatterId,
      direction: entity.direction,
      activity: entity.activity,
      userId: entity.userId,
      createdAt: entity.createdAt,
    });
  }

  static toPersistence<E extends EntityActivityRow>(
    record: EntityActivityRecord,
    entity: E,
  ): E {
    entity.entityId = record.entityId;
    entity.activity = record.activity;
    entity.userId = record.userId;
    entity.createdAt = record.createdAt;
    return entity;
  }

  static transferToPersistence(
    record: MatterDocumentActivityRecord,
  ): MatterDocumentActivityEntity {
    const entity = new MatterDocumentActivityEntity();
    entity.matterId = record.matterId;
    entity.counterpartMatterId = record.counterpartMatterId;
    entity.documentId = record.documentId;
    entity.direction = record.direction;
    entity.activity = record.activity;
    entity.userId = record.userId;
    entity.createdAt = record.createdAt;
    return entity;
  }

  private static commonFields(entity: EntityActivityRow) {
    return {
      id: entity.id,
      entityId: entity.entityId,
      activity: entity.activity,
      userId: entity.userId,
      createdAt: entity.createdAt,
    };
  }
}
