import { PropertyMapping } from '../../utils/sorting/property-mapping';

export type MatterSortField =
  | 'id'
  | 'description'
  | 'createdAt'
  | 'isArchived'
  | 'isDeleted';

export const matterPropertyMapping = new PropertyMapping<MatterSortField>(
  'Matter',
  {
    Id: { destinationProperties: ['id'] },
    Description: { destinationProperties: ['description'] },
    CreatedAt: { destinationProperties: ['createdAt'] },
    // Ascending age means newest first
    Age: { destinationProperties: ['createdAt'], revert: true },
    IsArchived: { destinationProperties: ['isArchived'] },
    IsDeleted: { destinationProperties: ['isDeleted'] },
  },
  [{ field: 'createdAt', direction: 'ASC' }],
);
