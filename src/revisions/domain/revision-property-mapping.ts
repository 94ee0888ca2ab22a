import { PropertyMapping } from '../../utils/sorting/property-mapping';

export type RevisionSortField =
  | 'id'
  | 'revisionNumber'
  | 'createdAt'
  | 'isDeleted';

export const revisionPropertyMapping = new PropertyMapping<RevisionSortField>(
  'Revision',
  {
    Id: { destinationProperties: ['id'] },
    RevisionNumber: { destinationProperties: ['revisionNumber'] },
    CreatedAt: { destinationProperties: ['createdAt'] },
    IsDeleted: { destinationProperties: ['isDeleted'] },
  },
  [{ field: 'revisionNumber', direction: 'ASC' }],
);
