import { EntityManager } from 'typeorm';
import { NullableType } from '../../../utils/types/nullable.type';
import { PagedList } from '../../../utils/pagination/paged-list';
import { PageRequest } from '../../../utils/pagination/page-request';
import { SortInstruction } from '../../../utils/sorting/property-mapping';
import { Matter } from '../entities/matter.entity';
import { MatterSortField } from '../matter-property-mapping';

export type MatterFilter = {
  description?: string;
  searchQuery?: string;
  includeArchived?: boolean;
  includeDeleted?: boolean;
};

export abstract class MatterRepository {
  abstract findById(id: string): Promise<NullableType<Matter>>;

  /**
   * Whether a matter that is not deleted already uses `description`
   * (case-insensitive), ignoring the matters in `excludeIds`.
   */
  abstract descriptionExists(
    description: string,
    excludeIds?: readonly string[],
  ): Promise<boolean>;

  abstract findPage(
    filter: MatterFilter,
    page: PageRequest,
    sort: readonly SortInstruction<MatterSortField>[],
  ): Promise<PagedList<Matter>>;

  /**
   * Transactional writes, called from staged unit-of-work operations.
   */
  abstract insert(matter: Matter, manager: EntityManager): Promise<void>;

  /**
   * Persists `matter` if the stored row still has `expectedVersion`;
   * otherwise throws ConcurrencyConflictError.
   */
  abstract update(
    matter: Matter,
    expectedVersion: number,
    manager: EntityManager,
  ): Promise<void>;
}
