import { documentPropertyMapping } from '../../documents/domain/document-property-mapping';
import { matterPropertyMapping } from '../../matters/domain/matter-property-mapping';
import { OperationErrorCode } from '../results/operation-result';
import { PropertyMapping } from './property-mapping';

describe('PropertyMapping', () => {
  describe('resolve', () => {
    it('should fall back to the resource default for an empty order', () => {
      expect(matterPropertyMapping.resolve('')).toEqual({
        ok: true,
        value: [{ field: 'createdAt', direction: 'ASC' }],
      });
      expect(matterPropertyMapping.resolve('  ')).toEqual({
        ok: true,
        value: [{ field: 'createdAt', direction: 'ASC' }],
      });
      expect(documentPropertyMapping.resolve(undefined)).toEqual({
        ok: true,
        value: [{ field: 'fileName', direction: 'ASC' }],
      });
    });

    it('should map clauses in order, case-insensitively', () => {
      expect(
        matterPropertyMapping.resolve('description DESC, createdat'),
      ).toEqual({
        ok: true,
        value: [
          { field: 'description', direction: 'DESC' },
          { field: 'createdAt', direction: 'ASC' },
        ],
      });
    });

    it('should invert the direction of reverted properties', () => {
      expect(matterPropertyMapping.resolve('Age')).toEqual({
        ok: true,
        value: [{ field: 'createdAt', direction: 'DESC' }],
      });
      expect(matterPropertyMapping.resolve('Age desc')).toEqual({
        ok: true,
        value: [{ field: 'createdAt', direction: 'ASC' }],
      });
    });

    it('should expand a property to all its destinations once', () => {
      expect(documentPropertyMapping.resolve('Name desc, FileName')).toEqual({
        ok: true,
        value: [
          { field: 'fileName', direction: 'DESC' },
          { field: 'extension', direction: 'DESC' },
        ],
      });
    });

    it('should reject a property outside the whitelist', () => {
      expect(matterPropertyMapping.resolve('CreatedAt, Password')).toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message:
            "Sort property 'Password' is not allowed for Matter. " +
            'Available properties: Id, Description, CreatedAt, Age, IsArchived, IsDeleted',
        },
      });
    });

    it('should reject an injected clause', () => {
      expect(matterPropertyMapping.resolve('Description; DROP TABLE')).toEqual(
        {
          ok: false,
          error: {
            code: OperationErrorCode.VALIDATION_FAILURE,
            message: "Malformed sort clause 'Description; DROP TABLE'",
          },
        },
      );
    });

    it('should reject an unknown direction', () => {
      expect(matterPropertyMapping.resolve('Description sideways')).toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message: "Unknown sort direction 'sideways' in 'Description sideways'",
        },
      });
    });

    it('should not hand out the frozen default', () => {
      const first = matterPropertyMapping.resolve(null);
      if (!first.ok) throw new Error('expected the default sort');
      first.value.push({ field: 'id', direction: 'DESC' });

      expect(matterPropertyMapping.resolve(null)).toEqual({
        ok: true,
        value: [{ field: 'createdAt', direction: 'ASC' }],
      });
    });
  });

  describe('validMappingExistsFor', () => {
    it('should accept whitelisted names only', () => {
      expect(documentPropertyMapping.validMappingExistsFor('fileSize desc')).toBe(
        true,
      );
      expect(documentPropertyMapping.validMappingExistsFor('')).toBe(true);
      expect(documentPropertyMapping.validMappingExistsFor('checksum')).toBe(
        false,
      );
    });
  });

  it('should be frozen once built', () => {
    const mapping = new PropertyMapping<'title'>(
      'Note',
      { Title: { destinationProperties: ['title'] } },
      [{ field: 'title', direction: 'ASC' }],
    );

    expect(Object.isFrozen(mapping)).toBe(true);
    expect(Object.isFrozen(mapping.defaultSort)).toBe(true);
    expect(mapping.availableKeys).toEqual(['Title']);
    expect(mapping.has('TITLE')).toBe(true);
  });
});
