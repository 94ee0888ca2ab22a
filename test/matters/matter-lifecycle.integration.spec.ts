import { Activity } from '../../src/audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../src/audit/domain/enums/audited-entity-kind.enum';
import { OperationErrorCode } from '../../src/utils/results/operation-result';
import {
  ALICE,
  LedgerTestContext,
  MISSING_ID,
  asActor,
  captureLogs,
  countRows,
  createLedgerTestContext,
  unwrap,
} from '../utils/test-helpers';

describe('Matter lifecycle (integration)', () => {
  let ctx: LedgerTestContext;
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(async () => {
    logs = captureLogs();
    ctx = await createLedgerTestContext();
  });

  afterEach(async () => {
    await ctx.module.close();
    jest.restoreAllMocks();
  });

  const activitiesOf = async (matterId: string): Promise<Activity[]> => {
    const page = unwrap(
      await ctx.audits.getPaginatedAudits({
        kind: AuditedEntityKind.MATTER,
        entityId: matterId,
      }),
    );
    return page.items.map((record) => record.activity);
  };

  describe('addMatter', () => {
    it('should create a matter with a CREATED record', async () => {
      const matter = unwrap(
        await ctx.matters.addMatter(
          { description: '  Estate of Doe ' },
          asActor(ALICE),
        ),
      );

      expect(matter.description).toBe('Estate of Doe');
      expect(matter.isDeleted).toBe(false);
      expect(matter.isArchived).toBe(false);

      const stored = unwrap(await ctx.matters.getMatter(matter.id));
      expect(stored.description).toBe('Estate of Doe');

      const records = unwrap(
        await ctx.audits.getPaginatedAudits({
          kind: AuditedEntityKind.MATTER,
          entityId: matter.id,
        }),
      );
      expect(records.items).toHaveLength(1);
      expect(records.items[0]).toMatchObject({
        kind: AuditedEntityKind.MATTER,
        entityId: matter.id,
        activity: Activity.CREATED,
        userId: ALICE,
        createdAt: matter.createdAt,
      });
    });

    it('should reject a duplicate description without writing anything', async () => {
      unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );

      const result = await ctx.matters.addMatter(
        { description: 'ESTATE OF DOE' },
        asActor(ALICE),
      );

      expect(result).toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: "A matter described as 'ESTATE OF DOE' already exists",
        },
      });
      expect(logs.warn).toHaveBeenCalledWith({
        operation: 'addMatter',
        code: OperationErrorCode.CONFLICT,
        message: "A matter described as 'ESTATE OF DOE' already exists",
        actorId: ALICE,
      });
      expect(await countRows(ctx.dataSource, 'matters')).toBe(1);
      expect(await countRows(ctx.dataSource, 'matter_activities')).toBe(1);
    });

    it('should reject an invalid payload before anything else', async () => {
      const result = await ctx.matters.addMatter(
        { description: '' },
        asActor('not-a-user'),
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(OperationErrorCode.VALIDATION_FAILURE);
        expect(result.error.message).toBe(
          'Matter is invalid: description: description should not be empty',
        );
      }
      expect(await countRows(ctx.dataSource, 'matters')).toBe(0);
    });

    it('should reject a malformed actor id', async () => {
      await expect(
        ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor('not-a-user'),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message: 'Actor id must be a UUID',
        },
      });
      expect(await countRows(ctx.dataSource, 'matter_activities')).toBe(0);
    });

    it('should report cancellation and leave storage untouched', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          { actorId: ALICE, signal: controller.signal },
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CANCELLED,
          message: 'Operation was cancelled before commit',
        },
      });
      expect(await countRows(ctx.dataSource, 'matters')).toBe(0);
      expect(await countRows(ctx.dataSource, 'matter_activities')).toBe(0);
    });
  });

  describe('updateMatter', () => {
    it('should rename the matter and bump its version', async () => {
      const matter = unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );

      const updated = unwrap(
        await ctx.matters.updateMatter(
          matter.id,
          { description: 'Estate of Jane Doe' },
          asActor(ALICE),
        ),
      );

      expect(updated.description).toBe('Estate of Jane Doe');
      expect(updated.version).toBe(2);
      expect(await activitiesOf(matter.id)).toEqual([
        Activity.UPDATED,
        Activity.CREATED,
      ]);
    });

    it('should report an unknown matter as not found', async () => {
      await expect(
        ctx.matters.updateMatter(
          MISSING_ID,
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.NOT_FOUND,
          message: `Matter ${MISSING_ID} does not exist`,
        },
      });
    });

    it('should reject a malformed matter id', async () => {
      await expect(
        ctx.matters.updateMatter(
          'matter-1',
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message: 'Matter id must be a UUID',
        },
      });
    });
  });

  describe('delete and restore', () => {
    it('should soft delete and restore with a record for each step', async () => {
      const matter = unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );

      expect(await ctx.matters.deleteMatter(matter.id, asActor(ALICE))).toEqual(
        { ok: true, value: undefined },
      );
      await expect(ctx.matters.getMatter(matter.id)).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.NOT_FOUND,
          message: `Matter ${matter.id} does not exist`,
        },
      });
      const deleted = unwrap(
        await ctx.matters.getMatter(matter.id, { includeDeleted: true }),
      );
      expect(deleted.isDeleted).toBe(true);

      await expect(
        ctx.matters.deleteMatter(matter.id, asActor(ALICE)),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Matter ${matter.id} is already deleted`,
        },
      });

      unwrap(await ctx.matters.restoreMatter(matter.id, asActor(ALICE)));
      expect(unwrap(await ctx.matters.getMatter(matter.id)).isDeleted).toBe(
        false,
      );
      expect(await activitiesOf(matter.id)).toEqual([
        Activity.RESTORED,
        Activity.DELETED,
        Activity.CREATED,
      ]);
    });

    it('should free the description of a deleted matter', async () => {
      const original = unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );
      unwrap(await ctx.matters.deleteMatter(original.id, asActor(ALICE)));

      unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );

      await expect(
        ctx.matters.restoreMatter(original.id, asActor(ALICE)),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: "Another matter is now described as 'Estate of Doe'",
        },
      });
    });

    it('should not restore a live matter', async () => {
      const matter = unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );

      await expect(
        ctx.matters.restoreMatter(matter.id, asActor(ALICE)),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Matter ${matter.id} is not deleted`,
        },
      });
    });
  });

  describe('archive', () => {
    it('should archive once and hide the matter from default listings', async () => {
      const matter = unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );

      const archived = unwrap(
        await ctx.matters.archiveMatter(matter.id, asActor(ALICE)),
      );
      expect(archived.isArchived).toBe(true);
      await expect(
        ctx.matters.archiveMatter(matter.id, asActor(ALICE)),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Matter ${matter.id} is already archived`,
        },
      });

      expect(unwrap(await ctx.matters.getPaginatedMatters()).totalCount).toBe(0);
      expect(
        unwrap(await ctx.matters.getPaginatedMatters({ includeArchived: true }))
          .totalCount,
      ).toBe(1);

      unwrap(await ctx.matters.unarchiveMatter(matter.id, asActor(ALICE)));
      expect(await activitiesOf(matter.id)).toEqual([
        Activity.UNARCHIVED,
        Activity.ARCHIVED,
        Activity.CREATED,
      ]);
    });
  });

  it('should record views without changing the matter', async () => {
    const matter = unwrap(
      await ctx.matters.addMatter(
        { description: 'Estate of Doe' },
        asActor(ALICE),
      ),
    );

    unwrap(await ctx.matters.recordMatterView(matter.id, asActor(ALICE)));

    expect(unwrap(await ctx.matters.getMatter(matter.id)).version).toBe(1);
    expect(await activitiesOf(matter.id)).toEqual([
      Activity.VIEWED,
      Activity.CREATED,
    ]);
  });

  describe('getPaginatedMatters', () => {
    beforeEach(async () => {
      for (let index = 1; index <= 25; index++) {
        unwrap(
          await ctx.matters.addMatter(
            { description: `Matter ${String(index).padStart(2, '0')}` },
            asActor(ALICE),
          ),
        );
      }
    });

    it('should return the requested page', async () => {
      const page = unwrap(
        await ctx.matters.getPaginatedMatters({
          pageNumber: 3,
          pageSize: 10,
          orderBy: 'Description',
        }),
      );

      expect(page.items.map((matter) => matter.description)).toEqual([
        'Matter 21',
        'Matter 22',
        'Matter 23',
        'Matter 24',
        'Matter 25',
      ]);
      expect(page.totalCount).toBe(25);
      expect(page.totalPages).toBe(3);
      expect(page.hasPrevious).toBe(true);
      expect(page.hasNext).toBe(false);
    });

    it('should sort descending and default the page size', async () => {
      const page = unwrap(
        await ctx.matters.getPaginatedMatters({ orderBy: 'description desc' }),
      );

      expect(page.pageSize).toBe(10);
      expect(page.items[0]?.description).toBe('Matter 25');
    });

    it('should clamp the page size to the configured maximum', async () => {
      const page = unwrap(
        await ctx.matters.getPaginatedMatters({ pageSize: 500 }),
      );

      expect(page.pageSize).toBe(50);
      expect(page.items).toHaveLength(25);
    });

    it('should filter by search text', async () => {
      const page = unwrap(
        await ctx.matters.getPaginatedMatters({ searchQuery: 'matter 1' }),
      );

      expect(page.totalCount).toBe(10);
    });

    it('should match wildcards in the search text literally', async () => {
      unwrap(
        await ctx.matters.addMatter(
          { description: 'Matter 50% share' },
          asActor(ALICE),
        ),
      );

      const percent = unwrap(
        await ctx.matters.getPaginatedMatters({ searchQuery: '%' }),
      );
      expect(percent.items.map((matter) => matter.description)).toEqual([
        'Matter 50% share',
      ]);

      const underscore = unwrap(
        await ctx.matters.getPaginatedMatters({ searchQuery: 'matter_1' }),
      );
      expect(underscore.totalCount).toBe(0);
    });

    it('should reject a non-positive page number', async () => {
      await expect(
        ctx.matters.getPaginatedMatters({ pageNumber: 0 }),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message: 'Page number must be greater than 0',
        },
      });
    });

    it('should reject an order clause outside the whitelist', async () => {
      await expect(
        ctx.matters.getPaginatedMatters({ orderBy: 'Description; DROP TABLE' }),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message: "Malformed sort clause 'Description; DROP TABLE'",
        },
      });
      expect(await countRows(ctx.dataSource, 'matters')).toBe(25);
    });
  });

  it('should answer existence queries', async () => {
    const matter = unwrap(
      await ctx.matters.addMatter(
        { description: 'Estate of Doe' },
        asActor(ALICE),
      ),
    );

    expect(unwrap(await ctx.matters.matterExists(matter.id))).toBe(true);
    expect(unwrap(await ctx.matters.matterExists(MISSING_ID))).toBe(false);
    expect(
      unwrap(await ctx.matters.matterDescriptionExists('estate of doe')),
    ).toBe(true);
    expect(
      unwrap(await ctx.matters.matterDescriptionExists('Estate of Roe')),
    ).toBe(false);
  });

  describe('shared unit of work', () => {
    it('should commit staged matters together and only on save', async () => {
      const unitOfWork = ctx.unitOfWorkFactory.create();
      const shared = { actorId: ALICE, unitOfWork };

      const first = unwrap(
        await ctx.matters.addMatter({ description: 'Estate of Doe' }, shared),
      );
      const second = unwrap(
        await ctx.matters.addMatter({ description: 'Estate of Roe' }, shared),
      );
      unwrap(await ctx.matters.archiveMatter(first.id, shared));

      expect(await countRows(ctx.dataSource, 'matters')).toBe(0);

      unwrap(await unitOfWork.saveChanges());

      expect(await countRows(ctx.dataSource, 'matters')).toBe(2);
      expect(await countRows(ctx.dataSource, 'matter_activities')).toBe(3);
      expect(unwrap(await ctx.matters.getMatter(first.id)).isArchived).toBe(
        true,
      );
      expect(unwrap(await ctx.matters.getMatter(second.id)).version).toBe(1);
    });

    it('should see staged descriptions when checking for duplicates', async () => {
      const unitOfWork = ctx.unitOfWorkFactory.create();
      const shared = { actorId: ALICE, unitOfWork };
      unwrap(
        await ctx.matters.addMatter({ description: 'Estate of Doe' }, shared),
      );

      await expect(
        ctx.matters.addMatter({ description: 'estate of doe' }, shared),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: "A matter described as 'estate of doe' already exists",
        },
      });
    });

    it('should let the second of two racing writers fail', async () => {
      const matter = unwrap(
        await ctx.matters.addMatter(
          { description: 'Estate of Doe' },
          asActor(ALICE),
        ),
      );
      const firstWork = ctx.unitOfWorkFactory.create();
      const secondWork = ctx.unitOfWorkFactory.create();

      unwrap(
        await ctx.matters.archiveMatter(matter.id, {
          actorId: ALICE,
          unitOfWork: firstWork,
        }),
      );
      unwrap(
        await ctx.matters.updateMatter(
          matter.id,
          { description: 'Estate of Jane Doe' },
          { actorId: ALICE, unitOfWork: secondWork },
        ),
      );

      unwrap(await firstWork.saveChanges());
      await expect(secondWork.saveChanges()).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Matter ${matter.id} was changed by another operation (expected version 1)`,
        },
      });

      const stored = unwrap(await ctx.matters.getMatter(matter.id));
      expect(stored.description).toBe('Estate of Doe');
      expect(stored.isArchived).toBe(true);
      expect(await activitiesOf(matter.id)).toEqual([
        Activity.ARCHIVED,
        Activity.CREATED,
      ]);
    });
  });
});
