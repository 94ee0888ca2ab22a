import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Revision } from '../../../../domain/entities/revision.entity';
import { RevisionRepository } from '../../../../domain/ports/revision.repository.port';
import { RevisionSortField } from '../../../../domain/revision-property-mapping';
import { ConcurrencyConflictError } from '../../../../../database/unit-of-work.errors';
import { PagedList } from '../../../../../utils/pagination/paged-list';
import { PageRequest } from '../../../../../utils/pagination/page-request';
import { applySort } from '../../../../../utils/sorting/apply-sort';
import { SortInstruction } from '../../../../../utils/sorting/property-mapping';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { RevisionEntity } from '../entities/revision.entity';
import { RevisionMapper } from '../mappers/revision.mapper';

@Injectable()
export class RevisionRelationalRepository implements RevisionRepository {
  constructor(
    @InjectRepository(RevisionEntity)
    private readonly repository: Repository<RevisionEntity>,
  ) {}

  async findById(id: string): Promise<NullableType<Revision>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? RevisionMapper.toDomain(entity) : null;
  }

  async maxRevisionNumber(documentId: string): Promise<number> {
    const row = await this.repository
      .createQueryBuilder('revision')
      .select('MAX(revision.revisionNumber)', 'max')
      .where('revision.documentId = :documentId', { documentId })
      .getRawOne<{ max: number | string | null }>();

    // postgres returns aggregates as strings
    return row?.max ? Number(row.max) : 0;
  }

  async revisionNumberExists(
    documentId: string,
    revisionNumber: number,
    excludeIds: readonly string[] = [],
  ): Promise<boolean> {
    const query = this.repository
      .createQueryBuilder('revision')
      .where('revision.documentId = :documentId', { documentId })
      .andWhere('revision.revisionNumber = :revisionNumber', {
        revisionNumber,
      });

    if (excludeIds.length > 0) {
      query.andWhere('revision.id NOT IN (:...excludeIds)', {
        excludeIds: [...excludeIds],
      });
    }
    return (await query.getCount()) > 0;
  }

  async findPage(
    documentId: string,
    filter: { includeDeleted?: boolean },
    page: PageRequest,
    sort: readonly SortInstruction<RevisionSortField>[],
  ): Promise<PagedList<Revision>> {
    const query = this.repository
      .createQueryBuilder('revision')
      .where('revision.documentId = :documentId', { documentId });

    if (!filter.includeDeleted) {
      query.andWhere('revision.isDeleted = :isDeleted', { isDeleted: false });
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
          return entities.map(RevisionMapper.toDomain);
        },
      },
      page.pageNumber,
      page.pageSize,
    );
  }

  async insert(revision: Revision, manager: EntityManager): Promise<void> {
    await manager.insert(RevisionEntity, RevisionMapper.toPersistence(revision));
  }

  async update(
    revision: Revision,
    expectedVersion: number,
    manager: EntityManager,
  ): Promise<void> {
    const result = await manager.update(
      RevisionEntity,
      { id: revision.id, version: expectedVersion },
      {
        revisionNumber: revision.revisionNumber,
        createdAt: revision.createdAt,
        isDeleted: revision.isDeleted,
        version: revision.version,
      },
    );
    if (!result.affected) {
      throw new ConcurrencyConflictError(
        'Revision',
        revision.id,
        expectedVersion,
      );
    }
  }
}
