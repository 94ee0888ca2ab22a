import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Matter } from '../../../../domain/entities/matter.entity';
import {
  MatterFilter,
  MatterRepository,
} from '../../../../domain/ports/matter.repository.port';
import { MatterSortField } from '../../../../domain/matter-property-mapping';
import { ConcurrencyConflictError } from '../../../../../database/unit-of-work.errors';
import { PagedList } from '../../../../../utils/pagination/paged-list';
import { PageRequest } from '../../../../../utils/pagination/page-request';
import { containsPattern } from '../../../../../utils/like-pattern';
import { applySort } from '../../../../../utils/sorting/apply-sort';
import { SortInstruction } from '../../../../../utils/sorting/property-mapping';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { MatterEntity } from '../entities/matter.entity';
import { MatterMapper } from '../mappers/matter.mapper';

@Injectable()
export class MatterRelationalRepository implements MatterRepository {
  constructor(
    @InjectRepository(MatterEntity)
    private readonly repository: Repository<MatterEntity>,
  ) {}

  async findById(id: string): Promise<NullableType<Matter>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? MatterMapper.toDomain(entity) : null;
  }

  async descriptionExists(
    description: string,
    excludeIds: readonly string[] = [],
  ): Promise<boolean> {
    const query = this.repository
      .createQueryBuilder('matter')
      .where('LOWER(matter.description) = LOWER(:description)', {
        description,
      })
      .andWhere('matter.isDeleted = :isDeleted', { isDeleted: false });

    if (excludeIds.length > 0) {
      query.andWhere('matter.id NOT IN (:...excludeIds)', {
        excludeIds: [...excludeIds],
      });
    }
    return (await query.getCount()) > 0;
  }

  async findPage(
    filter: MatterFilter,
    page: PageRequest,
    sort: readonly SortInstruction<MatterSortField>[],
  ): Promise<PagedList<Matter>> {
    const query = this.repository.createQueryBuilder('matter');

    if (!filter.includeDeleted) {
      query.andWhere('matter.isDeleted = :isDeleted', { isDeleted: false });
    }
    if (!filter.includeArchived) {
      query.andWhere('matter.isArchived = :isArchived', { isArchived: false });
    }
    if (filter.description) {
      query.andWhere('LOWER(matter.description) = LOWER(:description)', {
        description: filter.description.trim(),
      });
    }
    if (filter.searchQuery) {
      query.andWhere(
        "LOWER(matter.description) LIKE :searchQuery ESCAPE '\\'",
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
          return entities.map(MatterMapper.toDomain);
        },
      },
      page.pageNumber,
      page.pageSize,
    );
  }

  async insert(matter: Matter, manager: EntityManager): Promise<void> {
    await manager.insert(MatterEntity, MatterMapper.toPersistence(matter));
  }

  async update(
    matter: Matter,
    expectedVersion: number,
    manager: EntityManager,
  ): Promise<void> {
    const result = await manager.update(
      MatterEntity,
      { id: matter.id, version: expectedVersion },
      {
        description: matter.description,
        isArchived: matter.isArchived,
        isDeleted: matter.isDeleted,
        version: matter.version,
      },
    );
    if (!result.affected) {
      throw new ConcurrencyConflictError('Matter', matter.id, expectedVersion);
    }
  }
}
