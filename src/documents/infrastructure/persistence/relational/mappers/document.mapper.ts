import { Document } from '../../../../domain/entities/document.entity';
import { DocumentEntity } from '../entities/document.entity';

export class DocumentMapper {
  static toDomain(entity: DocumentEntity): Document {
    return new Document({
      id: entity.id,
      matterId: entity.matterId,
      fileName: entity.fileName,
      extension: entity.extension,
      fileSize: entity.fileSize,
      mimeType: entity.mimeType,
      checksum: entity.checksum,
      isCheckedOut: entity.isCheckedOut,
      checkedOutBy: entity.checkedOutBy ?? null,
      isDeleted: entity.isDeleted,
      createdAt: entity.createdAt,
      version: entity.version,
    });
  }

  static toPersistence(domain: Document): DocumentEntity {
    const entity = new DocumentEntity();
    entity.id = domain.id;
    entity.matterId = domain.matterId;
    entity.fileName = domain.fileName;
    entity.extension = domain.extension;
    entity.fileSize = domain.fileSize;
    entity.mimeType = domain.mimeType;
    entity.checksum = domain.checksum;
    entity.isCheckedOut = domain.isCheckedOut;
    entity.checkedOutBy = domain.checkedOutBy;
    entity.isDeleted = domain.isDeleted;
    entity.createdAt = domain.createdAt;
    entity.version = domain.version;
    return entity;
  }
}
