import { EntityManager } from 'typeorm';
import { NullableType } from '../../../utils/types/nullable.type';
import { PagedList } from '../../../utils/pagination/paged-list';
import { PageRequest } from '../../../utils/pagination/page-request';
import { SortInstruction } from '../../../utils/sorting/property-mapping';
import { Document } from '../entities/document.entity';
import { DocumentSortField } from '../document-property-mapping';

export type DocumentFilter = {
  fileName?: string;
  searchQuery?: string;
  includeDeleted?: boolean;
};

export abstract class DocumentRepository {
  abstract findById(id: string): Promise<NullableType<Document>>;

  /**
   * Whether a document that is not deleted in `matterId` already uses
   * `fileName` (case-insensitive), ignoring the documents in `excludeIds`.
   */
  abstract fileNameExists(
    matterId: string,
    fileName: string,
    excludeIds?: readonly string[],
  ): Promise<boolean>;

  abstract findPage(
    matterId: string,
    filter: DocumentFilter,
    page: PageRequest,
    sort: readonly SortInstruction<DocumentSortField>[],
  ): Promise<PagedList<Document>>;

  abstract insert(document: Document, manager: EntityManager): Promise<void>;

  /**
   * Persists `document` if the stored row still has `expectedVersion`;
   * otherwise throws ConcurrencyConflictError.
   */
  abstract update(
    document: Document,
    expectedVersion: number,
    manager: EntityManager,
  ): Promise<void>;
}
