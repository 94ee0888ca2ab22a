import { Matter } from '../../../../domain/entities/matter.entity';
import { MatterEntity } from '../entities/matter.entity';

export class MatterMapper {
  static toDomain(entity: MatterEntity): Matter {
    return new Matter({
      id: entity.id,
      description: entity.description,
      createdAt: entity.createdAt,
      isArchived: entity.isArchived,
      isDeleted: entity.isDeleted,
      version: entity.version,
    });
  }

  static toPersistence(domain: Matter): MatterEntity {
    const entity = new MatterEntity();
    entity.id = domain.id;
    entity.description = domain.description;
    entity.createdAt = domain.createdAt;
    entity.isArchived = domain.isArchived;
    entity.isDeleted = domain.isDeleted;
    entity.version = domain.version;
    return entity;
  }
}
