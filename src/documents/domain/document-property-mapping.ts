import { PropertyMapping } from '../../utils/sorting/property-mapping';

export type DocumentSortField =
  | 'id'
  | 'fileName'
  | 'extension'
  | 'fileSize'
  | 'mimeType'
  | 'createdAt'
  | 'isCheckedOut'
  | 'isDeleted';

export const documentPropertyMapping = new PropertyMapping<DocumentSortField>(
  'Document',
  {
    Id: { destinationProperties: ['id'] },
    FileName: { destinationProperties: ['fileName'] },
    Extension: { destinationProperties: ['extension'] },
    FileSize: { destinationProperties: ['fileSize'] },
    MimeType: { destinationProperties: ['mimeType'] },
    CreatedAt: { destinationProperties: ['createdAt'] },
    IsCheckedOut: { destinationProperties: ['isCheckedOut'] },
    IsDeleted: { destinationProperties: ['isDeleted'] },
    // Full name as shown to users
    Name: { destinationProperties: ['fileName', 'extension'] },
  },
  [{ field: 'fileName', direction: 'ASC' }],
);
