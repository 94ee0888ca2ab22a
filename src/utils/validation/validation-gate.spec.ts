import { Activity } from '../../audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../audit/domain/enums/audited-entity-kind.enum';
import { TransferMode } from '../../documents/domain/enums/transfer-mode.enum';
import { CreateMatterDto } from '../../matters/dto/create-matter.dto';
import { OperationErrorCode } from '../results/operation-result';
import { ValidationGate } from './validation-gate';

const ID = '3f2b8c1e-5d4a-4b6c-9e8f-7a6b5c4d3e2f';

describe('ValidationGate', () => {
  describe('uuid', () => {
    it('should pass a well-formed id', () => {
      expect(ValidationGate.uuid(ID, 'Matter id')).toEqual({ status: 'pass' });
    });

    it.each([[''], ['   '], [undefined], [null]])(
      'should reject %p as missing',
      (value) => {
        expect(ValidationGate.uuid(value, 'Matter id')).toEqual({
          status: 'bad-input',
          reason: 'Matter id must be a non-empty identifier',
        });
      },
    );

    it('should reject a malformed id', () => {
      expect(ValidationGate.uuid('matter-1', 'Matter id')).toEqual({
        status: 'bad-input',
        reason: 'Matter id must be a UUID',
      });
    });
  });

  it('should check enum membership', () => {
    expect(
      ValidationGate.enumMember(TransferMode.COPY, TransferMode, 'Mode'),
    ).toEqual({ status: 'pass' });
    expect(ValidationGate.enumMember('SHRED', TransferMode, 'Mode')).toEqual({
      status: 'bad-input',
      reason: 'Mode must be one of: MOVE, COPY',
    });
  });

  it('should only allow activities of the entity kind', () => {
    expect(
      ValidationGate.activityFor(AuditedEntityKind.DOCUMENT, Activity.CHECKED_OUT),
    ).toEqual({ status: 'pass' });
    expect(
      ValidationGate.activityFor(AuditedEntityKind.MATTER, Activity.CHECKED_OUT),
    ).toEqual({
      status: 'bad-input',
      reason: 'CHECKED_OUT is not a Matter activity',
    });
  });

  describe('pageParams', () => {
    it('should accept absent values', () => {
      expect(ValidationGate.pageParams({})).toEqual({ status: 'pass' });
    });

    it('should reject non-positive values', () => {
      expect(ValidationGate.pageParams({ pageNumber: 0 })).toEqual({
        status: 'bad-input',
        reason: 'Page number must be greater than 0',
      });
      expect(ValidationGate.pageParams({ pageNumber: 2, pageSize: -5 })).toEqual(
        {
          status: 'bad-input',
          reason: 'Page size must be greater than 0',
        },
      );
    });
  });

  describe('run', () => {
    it('should stop at the first failing check', async () => {
      const later = jest.fn(() => ValidationGate.PASS);

      const outcome = await ValidationGate.run(
        () => ValidationGate.PASS,
        async () => ValidationGate.notFound('Matter x does not exist'),
        later,
      );

      expect(outcome).toEqual({
        status: 'not-found',
        reason: 'Matter x does not exist',
      });
      expect(later).not.toHaveBeenCalled();
    });

    it('should pass when every check passes', async () => {
      await expect(
        ValidationGate.run(
          () => ValidationGate.present(0, 'Count'),
          () => ValidationGate.exists(async () => true, 'Matter'),
        ),
      ).resolves.toEqual({ status: 'pass' });
    });
  });

  it('should name the missing entity', async () => {
    await expect(
      ValidationGate.exists(async () => false, `Matter ${ID}`),
    ).resolves.toEqual({
      status: 'not-found',
      reason: `Matter ${ID} does not exist`,
    });
  });

  describe('payload', () => {
    it('should return the transformed DTO', async () => {
      const outcome = await ValidationGate.payload(
        CreateMatterDto,
        { description: '  Estate of Doe  ' },
        'Matter',
      );

      expect(outcome.status).toBe('pass');
      if (outcome.status === 'pass') {
        expect(outcome.value).toBeInstanceOf(CreateMatterDto);
        expect(outcome.value.description).toBe('Estate of Doe');
      }
    });

    it('should reject a missing payload', async () => {
      await expect(
        ValidationGate.payload(CreateMatterDto, null, 'Matter'),
      ).resolves.toEqual({
        status: 'bad-input',
        reason: 'Matter must be provided',
      });
    });

    it('should reject a payload that is not an object', async () => {
      await expect(
        ValidationGate.payload(CreateMatterDto, ['Estate of Doe'], 'Matter'),
      ).resolves.toEqual({
        status: 'bad-input',
        reason: 'Matter must be an object',
      });
    });

    it('should reject a blank description', async () => {
      await expect(
        ValidationGate.payload(CreateMatterDto, { description: '   ' }, 'Matter'),
      ).resolves.toEqual({
        status: 'bad-input',
        reason: 'Matter is invalid: description: description should not be empty',
      });
    });

    it('should reject unknown properties', async () => {
      await expect(
        ValidationGate.payload(
          CreateMatterDto,
          { description: 'Estate of Doe', ownerId: 7 },
          'Matter',
        ),
      ).resolves.toEqual({
        status: 'bad-input',
        reason: 'Matter is invalid: ownerId: property ownerId should not exist',
      });
    });
  });

  it('should map outcomes onto result codes', () => {
    expect(ValidationGate.toResult(ValidationGate.notFound('gone'))).toEqual({
      ok: false,
      error: { code: OperationErrorCode.NOT_FOUND, message: 'gone' },
    });
    expect(ValidationGate.toResult(ValidationGate.badInput('bad'))).toEqual({
      ok: false,
      error: { code: OperationErrorCode.VALIDATION_FAILURE, message: 'bad' },
    });
  });
});
