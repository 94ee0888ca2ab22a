import { Revision } from '../../../../domain/entities/revision.entity';
import { RevisionEntity } from '../entities/revision.entity';

export class RevisionMapper {
  static toDomain(entity: RevisionEntity): Revision {
    return new Revision({
      id: entity.id,
      documentId: entity.documentId,
      revisionNumber: entity.revisionNumber,
      createdAt: entity.createdAt,
      isDeleted: entity.isDeleted,
      version: entity.version,
    });
  }

  static toPersistence(domain: Revision): RevisionEntity {
    const entity = new RevisionEntity();
    entity.id = domain.id;
    entity.documentId = domain.documentId;
    entity.revisionNumber = domain.revisionNumber;
    entity.createdAt = domain.createdAt;
    entity.isDeleted = domain.isDeleted;
    entity.version = domain.version;
    return entity;
  }
}
