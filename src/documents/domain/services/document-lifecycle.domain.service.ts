import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { OperationContext } from '../../../database/operation-context';
import { UnitOfWork } from '../../../database/unit-of-work';
import { UnitOfWorkFactory } from '../../../database/unit-of-work.factory';
import {
  ActivityRecords,
  DocumentActivityRecord,
} from '../../../audit/domain/entities/activity-record.entity';
import { Activity } from '../../../audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../../audit/domain/enums/audited-entity-kind.enum';
import { AuditLedger } from '../../../audit/domain/ports/audit-ledger.port';
import { MatterLifecycleDomainService } from '../../../matters/domain/services/matter-lifecycle.domain.service';
import { Revision } from '../../../revisions/domain/entities/revision.entity';
import { RevisionRepository } from '../../../revisions/domain/ports/revision.repository.port';
import { PagedList } from '../../../utils/pagination/paged-list';
import { toPageRequest } from '../../../utils/pagination/page-request';
import {
  OperationResult,
  conflict,
  discardValue,
  forward,
  invalid,
  notFound,
  succeed,
  succeedVoid,
} from '../../../utils/results/operation-result';
import { runOperation } from '../../../utils/results/operation-runner';
import {
  GateOutcome,
  ValidationGate,
} from '../../../utils/validation/validation-gate';
import { NullableType } from '../../../utils/types/nullable.type';
import { CreateDocumentDto } from '../../dto/create-document.dto';
import { ListDocumentsDto } from '../../dto/list-documents.dto';
import {
  UPDATABLE_DOCUMENT_FIELDS,
  UpdateDocumentDto,
  UpdateDocumentPayload,
} from '../../dto/update-document.dto';
import { Document, DocumentProps } from '../entities/document.entity';
import { documentPropertyMapping } from '../document-property-mapping';
import { DocumentRepository } from '../ports/document.repository.port';
import { DocumentCheckState } from '../utils/document-check-state.util';

type DocumentChanges = Partial<Omit<DocumentProps, 'id' | 'version'>>;

type DocumentTransition = {
  activity: Activity;
  // Either the conflict that blocks the transition or the changes it makes
  plan: (
    document: Document,
  ) => { blocked: string } | { changes: DocumentChanges };
  guard?: (
    document: Document,
    next: Document,
    unitOfWork: UnitOfWork,
  ) => Promise<OperationResult<void>>;
};

/**
 * DocumentLifecycleDomainService
 *
 * Document mutations, including the check-out lock. A new document is
 * always created together with its first revision.
 */
@Injectable()
export class DocumentLifecycleDomainService {
  private readonly logger = new Logger(DocumentLifecycleDomainService.name);

  constructor(
    private readonly documentRepository: DocumentRepository,
    private readonly revisionRepository: RevisionRepository,
    private readonly matterLifecycleService: MatterLifecycleDomainService,
    private readonly auditLedger: AuditLedger,
    private readonly unitOfWorkFactory: UnitOfWorkFactory,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  addDocument(
    matterId: string,
    payload: NullableType<CreateDocumentDto>,
    ctx: OperationContext,
  ): Promise<OperationResult<Document>> {
    return runOperation<Document>(
      this.logger,
      'addDocument',
      { matterId, actorId: ctx.actorId },
      async () => {
        const checked = await ValidationGate.payload(
          CreateDocumentDto,
          payload,
          'Document',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }

        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.matterLifecycleService.findMatter(
          matterId,
          scope.unitOfWork,
        );
        if (!found.ok) return forward(found.error);
        const matter = found.value;
        if (matter.isDeleted) {
          return conflict(`Matter ${matter.id} is deleted`);
        }
        if (matter.isArchived) {
          return conflict(`Matter ${matter.id} is archived`);
        }

        const actor = await ValidationGate.run(
          () => ValidationGate.uuid(ctx.actorId, 'Actor id'),
          () =>
            ValidationGate.activityFor(
              AuditedEntityKind.DOCUMENT,
              Activity.CREATED,
            ),
          () =>
            ValidationGate.activityFor(
              AuditedEntityKind.REVISION,
              Activity.CREATED,
            ),
        );
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const { fileName } = checked.value;
        if (await this.fileNameTaken(matter.id, fileName, scope.unitOfWork)) {
          return conflict(
            `Matter ${matter.id} already has a document named '${fileName}'`,
          );
        }

        const document = new Document({
          id: randomUUID(),
          matterId: matter.id,
          fileName,
          extension: checked.value.extension,
          fileSize: checked.value.fileSize,
          mimeType: checked.value.mimeType,
          checksum: checked.value.checksum,
          isCheckedOut: false,
          checkedOutBy: null,
          isDeleted: false,
          createdAt: new Date(),
          version: 1,
        });
        this.stageNewDocument(scope.unitOfWork, document, ctx.actorId);
        return scope.complete(document);
      },
    );
  }

  updateDocument(
    documentId: string,
    payload: NullableType<UpdateDocumentPayload>,
    ctx: OperationContext,
  ): Promise<OperationResult<Document>> {
    return runOperation<Document>(
      this.logger,
      'updateDocument',
      { documentId, actorId: ctx.actorId },
      async () => {
        const checked = await ValidationGate.payload(
          UpdateDocumentDto,
          payload,
          'Document',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }
        // @IsOptional lets null through
        const cleared = UPDATABLE_DOCUMENT_FIELDS.filter(
          (field) => payload?.[field] === null,
        );
        if (cleared.length > 0) {
          return invalid(`Document update cannot clear ${cleared.join(', ')}`);
        }
        const changes = definedChanges(checked.value);
        if (Object.keys(changes).length === 0) {
          return invalid('Document update must change at least one field');
        }

        return this.applyTransition(documentId, ctx, {
          activity: Activity.UPDATED,
          plan: (document) => {
            if (document.isDeleted) {
              return { blocked: `Document ${document.id} is deleted` };
            }
            const locked = DocumentCheckState.lockedAgainst(
              document,
              ctx.actorId,
            );
            return locked ? { blocked: locked } : { changes };
          },
          guard: async (document, next, unitOfWork) =>
            next.fileName !== document.fileName &&
            (await this.fileNameTaken(
              next.matterId,
              next.fileName,
              unitOfWork,
              next.id,
            ))
              ? conflict(
                  `Matter ${next.matterId} already has a document named '${next.fileName}'`,
                )
              : succeedVoid(),
        });
      },
    );
  }

  async deleteDocument(
    documentId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    const result = await runOperation<Document>(
      this.logger,
      'deleteDocument',
      { documentId, actorId: ctx.actorId },
      () =>
        this.applyTransition(documentId, ctx, {
          activity: Activity.DELETED,
          plan: (document) => {
            const blocked = DocumentCheckState.deletionBlockedBy(document);
            return blocked ? { blocked } : { changes: { isDeleted: true } };
          },
        }),
    );
    return discardValue(result);
  }

  async restoreDocument(
    documentId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    const result = await runOperation<Document>(
      this.logger,
      'restoreDocument',
      { documentId, actorId: ctx.actorId },
      () =>
        this.applyTransition(documentId, ctx, {
          activity: Activity.RESTORED,
          plan: (document) =>
            document.isDeleted
              ? { changes: { isDeleted: false } }
              : { blocked: `Document ${document.id} is not deleted` },
          guard: async (document, _next, unitOfWork) =>
            (await this.fileNameTaken(
              document.matterId,
              document.fileName,
              unitOfWork,
              document.id,
            ))
              ? conflict(
                  `Matter ${document.matterId} now has another document named '${document.fileName}'`,
                )
              : succeedVoid(),
        }),
    );
    return discardValue(result);
  }

  /**
   * Checks the document out to the actor (`checkedOut = true`) or back in.
   * Only the holder can check a document in.
   */
  setDocumentCheckState(
    documentId: string,
    checkedOut: boolean,
    ctx: OperationContext,
  ): Promise<OperationResult<Document>> {
    return runOperation<Document>(
      this.logger,
      'setDocumentCheckState',
      { documentId, checkedOut, actorId: ctx.actorId },
      () =>
        this.applyTransition(documentId, ctx, {
          activity: checkedOut ? Activity.CHECKED_OUT : Activity.CHECKED_IN,
          plan: (document) => {
            const transition = DocumentCheckState.transition(
              document,
              checkedOut,
              ctx.actorId,
            );
            return transition.allowed
              ? { changes: transition.changes }
              : { blocked: transition.reason };
          },
        }),
    );
  }

  recordDocumentView(
    documentId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    return runOperation<void>(
      this.logger,
      'recordDocumentView',
      { documentId, actorId: ctx.actorId },
      async () => {
        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.findDocument(documentId, scope.unitOfWork);
        if (!found.ok) return forward(found.error);
        if (found.value.isDeleted) {
          return notFound(`Document ${documentId} does not exist`);
        }
        const actor = await this.actorGate(ctx, Activity.VIEWED);
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const record = ActivityRecords.forDocument(
          documentId,
          Activity.VIEWED,
          ctx.actorId,
        );
        scope.unitOfWork.stage((manager) =>
          this.auditLedger.append(record, manager),
        );
        return scope.complete(undefined);
      },
    );
  }

  getDocument(
    documentId: string,
    options: { includeDeleted?: boolean } = {},
  ): Promise<OperationResult<Document>> {
    return runOperation<Document>(
      this.logger,
      'getDocument',
      { documentId },
      async () => {
        const found = await this.findDocument(documentId);
        if (found.ok && found.value.isDeleted && !options.includeDeleted) {
          return notFound(`Document ${documentId} does not exist`);
        }
        return found;
      },
    );
  }

  getPaginatedDocuments(
    matterId: string,
    params: NullableType<ListDocumentsDto> = {},
  ): Promise<OperationResult<PagedList<Document>>> {
    return runOperation<PagedList<Document>>(
      this.logger,
      'getPaginatedDocuments',
      { matterId, orderBy: params?.orderBy },
      async () => {
        const checked = await ValidationGate.payload(
          ListDocumentsDto,
          params ?? {},
          'Document query',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }
        const found = await this.matterLifecycleService.findMatter(matterId);
        if (!found.ok) return forward(found.error);

        const query = checked.value;
        const pageCheck = ValidationGate.pageParams(query);
        if (pageCheck.status !== 'pass') {
          return ValidationGate.toResult(pageCheck);
        }
        const sort = documentPropertyMapping.resolve(query.orderBy);
        if (!sort.ok) return forward(sort.error);

        const page = await this.documentRepository.findPage(
          matterId,
          {
            fileName: query.fileName,
            searchQuery: query.searchQuery,
            includeDeleted: query.includeDeleted,
          },
          toPageRequest(query, this.paginationConfig()),
          sort.value,
        );
        return succeed(page);
      },
    );
  }

  documentExists(documentId: string): Promise<OperationResult<boolean>> {
    return runOperation<boolean>(
      this.logger,
      'documentExists',
      { documentId },
      async () => {
        const idCheck = ValidationGate.uuid(documentId, 'Document id');
        if (idCheck.status !== 'pass') return ValidationGate.toResult(idCheck);
        const document = await this.documentRepository.findById(documentId);
        return succeed(document !== null);
      },
    );
  }

  /**
   * Whether a non-deleted document of the matter already uses `fileName`
   * (case-insensitive).
   */
  fileNameExists(
    matterId: string,
    fileName: string,
  ): Promise<OperationResult<boolean>> {
    return runOperation<boolean>(
      this.logger,
      'fileNameExists',
      { matterId },
      async () => {
        const outcome = await ValidationGate.run(
          () => ValidationGate.uuid(matterId, 'Matter id'),
          () => ValidationGate.present(fileName, 'File name'),
        );
        if (outcome.status !== 'pass') return ValidationGate.toResult(outcome);
        return succeed(
          await this.documentRepository.fileNameExists(
            matterId,
            fileName.trim(),
          ),
        );
      },
    );
  }

  async findDocument(
    documentId: string,
    unitOfWork?: UnitOfWork,
  ): Promise<OperationResult<Document>> {
    const idCheck = ValidationGate.uuid(documentId, 'Document id');
    if (idCheck.status !== 'pass') return ValidationGate.toResult(idCheck);

    const document =
      unitOfWork?.find('document', documentId) ??
      (await this.documentRepository.findById(documentId));
    return document
      ? succeed(document)
      : notFound(`Document ${documentId} does not exist`);
  }

  /**
   * Tracked documents take precedence over their committed rows, so a name
   * freed or taken earlier in the same unit of work is accounted for.
   */
  async fileNameTaken(
    matterId: string,
    fileName: string,
    unitOfWork: UnitOfWork,
    excludeId?: string,
  ): Promise<boolean> {
    const key = fileName.toLowerCase();
    const staged = unitOfWork.tracked('document');
    if (
      staged.some(
        (document) =>
          document.id !== excludeId &&
          document.matterId === matterId &&
          !document.isDeleted &&
          document.fileName.toLowerCase() === key,
      )
    ) {
      return true;
    }

    const ignored = staged.map((document) => document.id);
    if (excludeId) ignored.push(excludeId);
    return this.documentRepository.fileNameExists(matterId, fileName, ignored);
  }

  /**
   * Stages the insert of a new document and of its revision 1, each with a
   * CREATED record carrying the document's creation time.
   */
  stageNewDocument(
    unitOfWork: UnitOfWork,
    document: Document,
    actorId: string,
  ): Revision {
    const revision = new Revision({
      id: randomUUID(),
      documentId: document.id,
      revisionNumber: 1,
      createdAt: document.createdAt,
      isDeleted: false,
      version: 1,
    });
    unitOfWork.track('revision', revision);
    this.stageWrite(
      unitOfWork,
      document,
      null,
      ActivityRecords.forDocument(
        document.id,
        Activity.CREATED,
        actorId,
        document.createdAt,
      ),
    );

    const revisionRecord = ActivityRecords.forRevision(
      revision.id,
      Activity.CREATED,
      actorId,
      document.createdAt,
    );
    unitOfWork.stage(async (manager) => {
      await this.revisionRepository.insert(revision, manager);
      await this.auditLedger.append(revisionRecord, manager);
    });
    return revision;
  }

  /**
   * Stages a document write. `expectedVersion` is null for an insert, else
   * the version the committed row must still have.
   */
  stageWrite(
    unitOfWork: UnitOfWork,
    document: Document,
    expectedVersion: NullableType<number>,
    record: NullableType<DocumentActivityRecord>,
  ): void {
    unitOfWork.track('document', document);
    unitOfWork.stage(async (manager) => {
      if (expectedVersion === null) {
        await this.documentRepository.insert(document, manager);
      } else {
        await this.documentRepository.update(
          document,
          expectedVersion,
          manager,
        );
      }
      if (record) {
        await this.auditLedger.append(record, manager);
      }
    });
  }

  private async applyTransition(
    documentId: string,
    ctx: OperationContext,
    transition: DocumentTransition,
  ): Promise<OperationResult<Document>> {
    const scope = this.unitOfWorkFactory.begin(ctx);
    const found = await this.findDocument(documentId, scope.unitOfWork);
    if (!found.ok) return forward(found.error);
    const current = found.value;

    const plan = transition.plan(current);
    if ('blocked' in plan) return conflict(plan.blocked);

    const actor = await this.actorGate(ctx, transition.activity);
    if (actor.status !== 'pass') return ValidationGate.toResult(actor);

    const next = new Document({
      ...current,
      ...plan.changes,
      version: current.version + 1,
    });
    if (transition.guard) {
      const guarded = await transition.guard(current, next, scope.unitOfWork);
      if (!guarded.ok) return forward(guarded.error);
    }

    this.stageWrite(
      scope.unitOfWork,
      next,
      current.version,
      ActivityRecords.forDocument(next.id, transition.activity, ctx.actorId),
    );
    return scope.complete(next);
  }

  private actorGate(
    ctx: OperationContext,
    activity: Activity,
  ): Promise<GateOutcome> {
    return ValidationGate.run(
      () => ValidationGate.uuid(ctx.actorId, 'Actor id'),
      () => ValidationGate.activityFor(AuditedEntityKind.DOCUMENT, activity),
    );
  }

  private paginationConfig() {
    return this.configService.getOrThrow('pagination', { infer: true });
  }
}

function definedChanges(dto: UpdateDocumentDto): DocumentChanges {
  const changes: DocumentChanges = {};
  if (dto.fileName !== undefined) changes.fileName = dto.fileName;
  if (dto.extension !== undefined) changes.extension = dto.extension;
  if (dto.fileSize !== undefined) changes.fileSize = dto.fileSize;
  if (dto.mimeType !== undefined) changes.mimeType = dto.mimeType;
  if (dto.checksum !== undefined) changes.checksum = dto.checksum;
  return changes;
}
