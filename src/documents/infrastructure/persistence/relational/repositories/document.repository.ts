import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Document } from '../../../../domain/entities/document.entity';
import {
  DocumentFilter,
  DocumentRepository,
} from '../../../../domain/ports/document.repository.port';
import { DocumentSortField } from '../../../../domain/document-property-mapping';
import { ConcurrencyConflictError } from '../../../../../database/unit-of-work.errors';
import { PagedList } from '../../../../../utils/pagination/paged-list';
import { PageRequest } from '../../../../../utils/pagination/page-request';
import { containsPattern } from '../../../../../utils/like-pattern';
import { applySort } from '../../../../../utils/sorting/apply-sort';
import { SortInstruction } from '../../../../../utils/sorting/property-mapping';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { DocumentEntity } from '../entities/document.entity';
import { DocumentMapper } from '../mappers/document.mapper';

@Injectable()
export class DocumentRelationalRepository implements DocumentRepository {
  constructor(
    @InjectRepository(DocumentEntity)
    private readonly repository: Repository<DocumentEntity>,
  ) {}

  async findById(id: string): Promise<NullableType<Document>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? DocumentMapper.toDomain(entity) : null;
  }

  async fileNameExists(
    matterId: string,
    fileName: string,
    excludeIds: readonly string[] = [],
  ): Promise<boolean> {
    const query = this.repository
      .createQueryBuilder('document')
      .where('document.matterId = :matterId', { matterId })
      .andWhere('LOWER(document.fileName) = LOWER(:fileName)', { fileName })
      .andWhere('document.isDeleted = :isDeleted', { isDeleted: false });

    if (excludeIds.length > 0) {
      query.andWhere('document.id NOT IN (:...excludeIds)', {
        excludeIds: [...excludeIds],
      });
    }
    return (await query.getCount()) > 0;
  }

  async findPage(
    matterId: string,
    filter: DocumentFilter,
    page: PageRequest,
    sort: readonly SortInstruction<DocumentSortField>[],
  ): Promise<PagedList<Document>> {
    const query = this.repository
      .createQueryBuilder('document')
      .where('document.matterId = :matterId', { matterId });

    if (!filter.includeDeleted) {
      query.andWhere('document.isDeleted = :isDeleted', { isDeleted: false });
    }
    if (filter.fileName) {
      query.andWhere('LOWER(document.fileName) = LOWER(:fileName)', {
        fileName: filter.fileName.trim(),
      });
    }
    if (filter.searchQuery) {
      query.andWhere(
        "(LOWER(document.fileName) LIKE :searchQuery ESCAPE '\\' OR LOWER(document.extension) LIKE :searchQuery ESCAPE '\\' OR LOWER(document.mimeType) LIKE :searchQuery ESCAPE '\\')",
        { searchQuery: containsPattern(filter.searchQuery) },
      );
    }

    applySort(query, sort, 'id');

    return PagedList.create(
      {
        count: () => query.getCount(),
        slice: async (offset, limit) => {
          const entities = await query
            .clone()
            .offset(offset)
            .limit(limit)
            .getMany();
          return entities.map(DocumentMapper.toDomain);
        },
      },
      page.pageNumber,
      page.pageSize,
    );
  }

  async insert(document: Document, manager: EntityManager): Promise<void> {
    await manager.insert(DocumentEntity, DocumentMapper.toPersistence(document));
  }

  async update(
    document: Document,
    expectedVersion: number,
    manager: EntityManager,
  ): Promise<void> {
    const result = await manager.update(
      DocumentEntity,
      { id: document.id, version: expectedVersion },
      {
        matterId: document.matterId,
        fileName: document.fileName,
        extension: document.extension,
        fileSize: document.fileSize,
        mimeType: document.mimeType,
        checksum: document.checksum,
        isCheckedOut: document.isCheckedOut,
        checkedOutBy: document.checkedOutBy,
        isDeleted: document.isDeleted,
        version: document.version,
      },
    );
    if (!result.affected) {
      throw new ConcurrencyConflictError(
        'Document',
        document.id,
        expectedVersion,
      );
    }
  }
}
