import { EntityManager } from 'typeorm';
import { NullableType } from '../../../utils/types/nullable.type';
import { PagedList } from '../../../utils/pagination/paged-list';
import { PageRequest } from '../../../utils/pagination/page-request';
import { SortInstruction } from '../../../utils/sorting/property-mapping';
import { Revision } from '../entities/revision.entity';
import { RevisionSortField } from '../revision-property-mapping';

export abstract class RevisionRepository {
  abstract findById(id: string): Promise<NullableType<Revision>>;

  /**
   * Highest revision number ever assigned for the document, deleted
   * revisions included; 0 when it has none.
   */
  abstract maxRevisionNumber(documentId: string): Promise<number>;

  /**
   * Whether the document already has a revision with this number, deleted
   * ones included, ignoring the revisions in `excludeIds`.
   */
  abstract revisionNumberExists(
    documentId: string,
    revisionNumber: number,
    excludeIds?: readonly string[],
  ): Promise<boolean>;

  abstract findPage(
    documentId: string,
    filter: { includeDeleted?: boolean },
    page: PageRequest,
    sort: readonly SortInstruction<RevisionSortField>[],
  ): Promise<PagedList<Revision>>;

  abstract insert(revision: Revision, manager: EntityManager): Promise<void>;

  abstract update(
    revision: Revision,
    expectedVersion: number,
    manager: EntityManager,
  ): Promise<void>;
}
