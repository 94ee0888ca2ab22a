import { MatterDocumentActivityRecord } from '../../src/audit/domain/entities/activity-record.entity';
import { AuditedEntityKind } from '../../src/audit/domain/enums/audited-entity-kind.enum';
import { Activity } from '../../src/audit/domain/enums/activity.enum';
import { AuditLedger } from '../../src/audit/domain/ports/audit-ledger.port';
import { TransferDirection } from '../../src/audit/domain/enums/transfer-direction.enum';
import { Document } from '../../src/documents/domain/entities/document.entity';
import { TransferMode } from '../../src/documents/domain/enums/transfer-mode.enum';
import { Matter } from '../../src/matters/domain/entities/matter.entity';
import { OperationErrorCode } from '../../src/utils/results/operation-result';
import {
  ALICE,
  BOB,
  LedgerTestContext,
  MISSING_ID,
  asActor,
  captureLogs,
  countRows,
  createLedgerTestContext,
  documentPayload,
  unwrap,
} from '../utils/test-helpers';

describe('Document transfer (integration)', () => {
  let ctx: LedgerTestContext;
  let source: Matter;
  let target: Matter;
  let document: Document;

  beforeEach(async () => {
    captureLogs();
    ctx = await createLedgerTestContext();
    source = unwrap(
      await ctx.matters.addMatter({ description: 'Doe v. Roe' }, asActor(ALICE)),
    );
    target = unwrap(
      await ctx.matters.addMatter(
        { description: 'Doe v. Roe (appeal)' },
        asActor(ALICE),
      ),
    );
    document = unwrap(
      await ctx.documents.addDocument(
        source.id,
        documentPayload('complaint'),
        asActor(ALICE),
      ),
    );
  });

  afterEach(async () => {
    await ctx.module.close();
    jest.restoreAllMocks();
  });

  const transfers = async (
    query: { matterId?: string; documentId?: string },
    direction?: TransferDirection,
  ) =>
    unwrap(
      await ctx.audits.getPaginatedAudits({
        kind: AuditedEntityKind.MATTER_DOCUMENT,
        ...query,
        direction,
      }),
    ).items.filter(
      (record): record is MatterDocumentActivityRecord =>
        record.kind === AuditedEntityKind.MATTER_DOCUMENT,
    );

  describe('MOVE', () => {
    it('should reassign the document and record both halves', async () => {
      const moved = unwrap(
        await ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.MOVE,
          asActor(BOB),
        ),
      );

      expect(moved.id).toBe(document.id);
      expect(moved.matterId).toBe(target.id);
      expect(moved.version).toBe(2);
      expect(unwrap(await ctx.documents.getDocument(document.id)).matterId).toBe(
        target.id,
      );

      const records = await transfers({ documentId: document.id });
      expect(records).toHaveLength(2);
      const from = records.find(
        (record) => record.direction === TransferDirection.FROM,
      );
      const to = records.find(
        (record) => record.direction === TransferDirection.TO,
      );
      expect(from).toMatchObject({
        matterId: source.id,
        counterpartMatterId: target.id,
        documentId: document.id,
        activity: Activity.MOVED,
        userId: BOB,
      });
      expect(to).toMatchObject({
        matterId: target.id,
        counterpartMatterId: source.id,
        documentId: document.id,
        activity: Activity.MOVED,
        userId: BOB,
      });
      expect(from?.createdAt.getTime()).toBe(to?.createdAt.getTime());

      // A move is not a document activity of its own
      expect(await countRows(ctx.dataSource, 'document_activities')).toBe(1);
    });

    it('should keep neither half when the second record fails', async () => {
      const ledger = ctx.module.get(AuditLedger);
      const append = ledger.append.bind(ledger);
      let transferAppends = 0;
      jest
        .spyOn(ledger, 'append')
        .mockImplementation(async (record, manager) => {
          if (record.kind === AuditedEntityKind.MATTER_DOCUMENT) {
            transferAppends += 1;
            if (transferAppends === 2) throw new Error('ledger offline');
          }
          return append(record, manager);
        });

      await expect(
        ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.MOVE,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.STORAGE_FAULT,
          message: 'The changes could not be saved',
        },
      });
      expect(transferAppends).toBe(2);
      expect(
        await countRows(ctx.dataSource, 'matter_document_activities'),
      ).toBe(0);
      const stored = unwrap(await ctx.documents.getDocument(document.id));
      expect(stored.matterId).toBe(source.id);
      expect(stored.version).toBe(1);
    });

    it('should filter transfer records by matter and direction', async () => {
      unwrap(
        await ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.MOVE,
          asActor(ALICE),
        ),
      );

      const outgoing = await transfers(
        { matterId: source.id },
        TransferDirection.FROM,
      );
      expect(outgoing).toHaveLength(1);
      expect(outgoing[0]?.counterpartMatterId).toBe(target.id);

      expect(
        await transfers({ matterId: source.id }, TransferDirection.TO),
      ).toHaveLength(0);
      expect(
        await transfers({ matterId: target.id }, TransferDirection.TO),
      ).toHaveLength(1);
    });

    it('should refuse a checked-out document', async () => {
      unwrap(
        await ctx.documents.setDocumentCheckState(
          document.id,
          true,
          asActor(ALICE),
        ),
      );

      await expect(
        ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.MOVE,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Document ${document.id} is checked out and cannot be moved`,
        },
      });
    });

    it('should refuse a document of another matter', async () => {
      await expect(
        ctx.transfers.transferDocument(
          target.id,
          source.id,
          document.id,
          TransferMode.MOVE,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Document ${document.id} does not belong to matter ${target.id}`,
        },
      });
    });
  });

  describe('COPY', () => {
    it('should create an independent document in the target', async () => {
      const copy = unwrap(
        await ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.COPY,
          asActor(ALICE),
        ),
      );

      expect(copy.id).not.toBe(document.id);
      expect(copy).toMatchObject({
        matterId: target.id,
        fileName: 'complaint',
        checksum: document.checksum,
        isCheckedOut: false,
        version: 1,
      });

      const original = unwrap(await ctx.documents.getDocument(document.id));
      expect(original.matterId).toBe(source.id);

      const copyRevisions = unwrap(
        await ctx.revisions.getPaginatedRevisions(copy.id),
      );
      expect(copyRevisions.items.map((rev) => rev.revisionNumber)).toEqual([1]);

      const records = await transfers({ documentId: document.id });
      expect(records.map((record) => record.activity)).toEqual([
        Activity.COPIED,
        Activity.COPIED,
      ]);
      expect(await countRows(ctx.dataSource, 'documents')).toBe(2);
    });

    it('should copy a checked-out document as available', async () => {
      unwrap(
        await ctx.documents.setDocumentCheckState(
          document.id,
          true,
          asActor(BOB),
        ),
      );

      const copy = unwrap(
        await ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.COPY,
          asActor(ALICE),
        ),
      );

      expect(copy.isCheckedOut).toBe(false);
      expect(copy.checkedOutBy).toBeNull();
    });
  });

  describe('preconditions', () => {
    it('should reject the same source and target', async () => {
      await expect(
        ctx.transfers.transferDocument(
          source.id,
          source.id.toUpperCase(),
          document.id,
          TransferMode.MOVE,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.VALIDATION_FAILURE,
          message: 'Source and target matter must be different',
        },
      });
    });

    it('should refuse an archived target without writing anything', async () => {
      unwrap(await ctx.matters.archiveMatter(target.id, asActor(ALICE)));

      await expect(
        ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.COPY,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Target matter ${target.id} is archived`,
        },
      });
      expect(await countRows(ctx.dataSource, 'documents')).toBe(1);
      expect(
        await countRows(ctx.dataSource, 'matter_document_activities'),
      ).toBe(0);
    });

    it('should refuse a name already used in the target', async () => {
      unwrap(
        await ctx.documents.addDocument(
          target.id,
          documentPayload('Complaint'),
          asActor(ALICE),
        ),
      );

      await expect(
        ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.MOVE,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Matter ${target.id} already has a document named 'complaint'`,
        },
      });
      expect(
        unwrap(await ctx.documents.getDocument(document.id)).matterId,
      ).toBe(source.id);
    });

    it('should refuse a deleted document', async () => {
      unwrap(await ctx.documents.deleteDocument(document.id, asActor(ALICE)));

      await expect(
        ctx.transfers.transferDocument(
          source.id,
          target.id,
          document.id,
          TransferMode.COPY,
          asActor(ALICE),
        ),
      ).resolves.toEqual({
        ok: false,
        error: {
          code: OperationErrorCode.CONFLICT,
          message: `Document ${document.id} is deleted`,
        },
      });
    });

    it('should report a missing target matter', async () => {
      await expect(
        ctx.transfers.transferDocument(
          source.id,
          MISSING_ID,
          document.id,
          TransferMode.MOVE,
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
  });
});
