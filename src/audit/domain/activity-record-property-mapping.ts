import { PropertyMapping } from '../../utils/sorting/property-mapping';

export type ActivitySortField = 'createdAt' | 'activity' | 'userId';

export type TransferSortField =
  | ActivitySortField
  | 'direction'
  | 'matterId'
  | 'counterpartMatterId';

export const activityRecordPropertyMapping =
  new PropertyMapping<ActivitySortField>(
    'ActivityRecord',
    {
      CreatedAt: { destinationProperties: ['createdAt'] },
      Activity: { destinationProperties: ['activity'] },
      UserId: { destinationProperties: ['userId'] },
    },
    [{ field: 'createdAt', direction: 'DESC' }],
  );

export const transferRecordPropertyMapping =
  new PropertyMapping<TransferSortField>(
    'MatterDocumentActivityRecord',
    {
      CreatedAt: { destinationProperties: ['createdAt'] },
      Activity: { destinationProperties: ['activity'] },
      UserId: { destinationProperties: ['userId'] },
      Direction: { destinationProperties: ['direction'] },
      MatterId: { destinationProperties: ['matterId'] },
      CounterpartMatterId: { destinationProperties: ['counterpartMatterId'] },
    },
    [{ field: 'createdAt', direction: 'DESC' }],
  );
