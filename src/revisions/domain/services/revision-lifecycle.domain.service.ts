import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { OperationContext } from '../../../database/operation-context';
import { UnitOfWork } from '../../../database/unit-of-work';
import { UnitOfWorkFactory } from '../../../database/unit-of-work.factory';
import {
  ActivityRecords,
  RevisionActivityRecord,
} from '../../../audit/domain/entities/activity-record.entity';
import { Activity } from '../../../audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../../audit/domain/enums/audited-entity-kind.enum';
import { AuditLedger } from '../../../audit/domain/ports/audit-ledger.port';
import { DocumentLifecycleDomainService } from '../../../documents/domain/services/document-lifecycle.domain.service';
import { DocumentCheckState } from '../../../documents/domain/utils/document-check-state.util';
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
import { ListRevisionsDto } from '../../dto/list-revisions.dto';
import {
  UPDATABLE_REVISION_FIELDS,
  UpdateRevisionDto,
  UpdateRevisionPayload,
} from '../../dto/update-revision.dto';
import { Revision } from '../entities/revision.entity';
import { RevisionRepository } from '../ports/revision.repository.port';
import { revisionPropertyMapping } from '../revision-property-mapping';

@Injectable()
export class RevisionLifecycleDomainService {
  private readonly logger = new Logger(RevisionLifecycleDomainService.name);

  constructor(
    private readonly revisionRepository: RevisionRepository,
    private readonly documentLifecycleService: DocumentLifecycleDomainService,
    private readonly auditLedger: AuditLedger,
    private readonly unitOfWorkFactory: UnitOfWorkFactory,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Appends the next revision to a document. Numbers are never reused, so
   * deleted revisions still count.
   */
  addRevision(
    documentId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<Revision>> {
    return runOperation<Revision>(
      this.logger,
      'addRevision',
      { documentId, actorId: ctx.actorId },
      async () => {
        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.documentLifecycleService.findDocument(
          documentId,
          scope.unitOfWork,
        );
        if (!found.ok) return forward(found.error);
        const document = found.value;
        if (document.isDeleted) {
          return conflict(`Document ${document.id} is deleted`);
        }
        const locked = DocumentCheckState.lockedAgainst(document, ctx.actorId);
        if (locked) return conflict(locked);

        const actor = await this.actorGate(ctx, Activity.CREATED);
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const revision = new Revision({
          id: randomUUID(),
          documentId: document.id,
          revisionNumber:
            (await this.latestRevisionNumber(document.id, scope.unitOfWork)) +
            1,
          createdAt: new Date(),
          isDeleted: false,
          version: 1,
        });
        this.stageWrite(
          scope.unitOfWork,
          revision,
          null,
          ActivityRecords.forRevision(
            revision.id,
            Activity.CREATED,
            ctx.actorId,
            revision.createdAt,
          ),
        );
        return scope.complete(revision);
      },
    );
  }

  deleteRevision(
    revisionId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    return this.setDeleted('deleteRevision', revisionId, true, ctx);
  }

  restoreRevision(
    revisionId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    return this.setDeleted('restoreRevision', revisionId, false, ctx);
  }

  /**
   * Changes a revision's number or creation time. The number must stay
   * unique within the document, counting deleted revisions.
   */
  updateRevision(
    revisionId: string,
    payload: NullableType<UpdateRevisionPayload>,
    ctx: OperationContext,
  ): Promise<OperationResult<Revision>> {
    return runOperation<Revision>(
      this.logger,
      'updateRevision',
      { revisionId, actorId: ctx.actorId },
      async () => {
        const checked = await ValidationGate.payload(
          UpdateRevisionDto,
          payload,
          'Revision',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }
        // @IsOptional lets null through
        const cleared = UPDATABLE_REVISION_FIELDS.filter(
          (field) => payload?.[field] === null,
        );
        if (cleared.length > 0) {
          return invalid(`Revision update cannot clear ${cleared.join(', ')}`);
        }
        const { revisionNumber, createdAt } = checked.value;
        if (revisionNumber === undefined && createdAt === undefined) {
          return invalid('Revision update must change at least one field');
        }

        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.findRevision(revisionId, scope.unitOfWork);
        if (!found.ok) return forward(found.error);
        const current = found.value;
        if (current.isDeleted) {
          return conflict(`Revision ${revisionId} is deleted`);
        }
        const writable = await this.ownerAllowsChange(
          current,
          scope.unitOfWork,
          ctx,
        );
        if (!writable.ok) return forward(writable.error);

        const actor = await this.actorGate(ctx, Activity.UPDATED);
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        if (
          revisionNumber !== undefined &&
          revisionNumber !== current.revisionNumber &&
          (await this.revisionNumberTaken(
            current.documentId,
            revisionNumber,
            scope.unitOfWork,
            current.id,
          ))
        ) {
          return conflict(
            `Document ${current.documentId} already has revision ${revisionNumber}`,
          );
        }

        const next = new Revision({
          ...current,
          revisionNumber: revisionNumber ?? current.revisionNumber,
          createdAt: createdAt ?? current.createdAt,
          version: current.version + 1,
        });
        this.stageWrite(
          scope.unitOfWork,
          next,
          current.version,
          ActivityRecords.forRevision(next.id, Activity.UPDATED, ctx.actorId),
        );
        return scope.complete(next);
      },
    );
  }

  recordRevisionView(
    revisionId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    return runOperation<void>(
      this.logger,
      'recordRevisionView',
      { revisionId, actorId: ctx.actorId },
      async () => {
        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.findRevision(revisionId, scope.unitOfWork);
        if (!found.ok) return forward(found.error);
        if (found.value.isDeleted) {
          return notFound(`Revision ${revisionId} does not exist`);
        }
        const actor = await this.actorGate(ctx, Activity.VIEWED);
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const record = ActivityRecords.forRevision(
          revisionId,
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

  getRevision(
    revisionId: string,
    options: { includeDeleted?: boolean } = {},
  ): Promise<OperationResult<Revision>> {
    return runOperation<Revision>(
      this.logger,
      'getRevision',
      { revisionId },
      async () => {
        const found = await this.findRevision(revisionId);
        if (found.ok && found.value.isDeleted && !options.includeDeleted) {
          return notFound(`Revision ${revisionId} does not exist`);
        }
        return found;
      },
    );
  }

  getPaginatedRevisions(
    documentId: string,
    params: NullableType<ListRevisionsDto> = {},
  ): Promise<OperationResult<PagedList<Revision>>> {
    return runOperation<PagedList<Revision>>(
      this.logger,
      'getPaginatedRevisions',
      { documentId, orderBy: params?.orderBy },
      async () => {
        const checked = await ValidationGate.payload(
          ListRevisionsDto,
          params ?? {},
          'Revision query',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }
        const found =
          await this.documentLifecycleService.findDocument(documentId);
        if (!found.ok) return forward(found.error);

        const query = checked.value;
        const pageCheck = ValidationGate.pageParams(query);
        if (pageCheck.status !== 'pass') {
          return ValidationGate.toResult(pageCheck);
        }
        const sort = revisionPropertyMapping.resolve(query.orderBy);
        if (!sort.ok) return forward(sort.error);

        return succeed(
          await this.revisionRepository.findPage(
            documentId,
            { includeDeleted: query.includeDeleted },
            toPageRequest(
              query,
              this.configService.getOrThrow('pagination', { infer: true }),
            ),
            sort.value,
          ),
        );
      },
    );
  }

  revisionExists(revisionId: string): Promise<OperationResult<boolean>> {
    return runOperation<boolean>(
      this.logger,
      'revisionExists',
      { revisionId },
      async () => {
        const idCheck = ValidationGate.uuid(revisionId, 'Revision id');
        if (idCheck.status !== 'pass') return ValidationGate.toResult(idCheck);
        const revision = await this.revisionRepository.findById(revisionId);
        return succeed(revision !== null);
      },
    );
  }

  async findRevision(
    revisionId: string,
    unitOfWork?: UnitOfWork,
  ): Promise<OperationResult<Revision>> {
    const idCheck = ValidationGate.uuid(revisionId, 'Revision id');
    if (idCheck.status !== 'pass') return ValidationGate.toResult(idCheck);

    const revision =
      unitOfWork?.find('revision', revisionId) ??
      (await this.revisionRepository.findById(revisionId));
    return revision
      ? succeed(revision)
      : notFound(`Revision ${revisionId} does not exist`);
  }

  private async setDeleted(
    operation: string,
    revisionId: string,
    isDeleted: boolean,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    const activity = isDeleted ? Activity.DELETED : Activity.RESTORED;
    const result = await runOperation<Revision>(
      this.logger,
      operation,
      { revisionId, actorId: ctx.actorId },
      async () => {
        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.findRevision(revisionId, scope.unitOfWork);
        if (!found.ok) return forward(found.error);
        const current = found.value;
        if (current.isDeleted === isDeleted) {
          return conflict(
            isDeleted
              ? `Revision ${revisionId} is already deleted`
              : `Revision ${revisionId} is not deleted`,
          );
        }

        const writable = await this.ownerAllowsChange(
          current,
          scope.unitOfWork,
          ctx,
        );
        if (!writable.ok) return forward(writable.error);

        const actor = await this.actorGate(ctx, activity);
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const next = new Revision({
          ...current,
          isDeleted,
          version: current.version + 1,
        });
        this.stageWrite(
          scope.unitOfWork,
          next,
          current.version,
          ActivityRecords.forRevision(next.id, activity, ctx.actorId),
        );
        return scope.complete(next);
      },
    );
    return discardValue(result);
  }

  /** The owning document must be live and not checked out by someone else. */
  private async ownerAllowsChange(
    revision: Revision,
    unitOfWork: UnitOfWork,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    const owner = await this.documentLifecycleService.findDocument(
      revision.documentId,
      unitOfWork,
    );
    if (!owner.ok) return forward(owner.error);
    if (owner.value.isDeleted) {
      return conflict(`Document ${owner.value.id} is deleted`);
    }
    const locked = DocumentCheckState.lockedAgainst(owner.value, ctx.actorId);
    return locked ? conflict(locked) : succeedVoid();
  }

  private async revisionNumberTaken(
    documentId: string,
    revisionNumber: number,
    unitOfWork: UnitOfWork,
    excludeId: string,
  ): Promise<boolean> {
    const staged = unitOfWork
      .tracked('revision')
      .filter((revision) => revision.documentId === documentId);
    if (
      staged.some(
        (revision) =>
          revision.id !== excludeId &&
          revision.revisionNumber === revisionNumber,
      )
    ) {
      return true;
    }

    const ignored = staged.map((revision) => revision.id);
    ignored.push(excludeId);
    return this.revisionRepository.revisionNumberExists(
      documentId,
      revisionNumber,
      ignored,
    );
  }

  private async latestRevisionNumber(
    documentId: string,
    unitOfWork: UnitOfWork,
  ): Promise<number> {
    const committed =
      await this.revisionRepository.maxRevisionNumber(documentId);
    return unitOfWork
      .tracked('revision')
      .filter((revision) => revision.documentId === documentId)
      .reduce(
        (latest, revision) => Math.max(latest, revision.revisionNumber),
        committed,
      );
  }

  private stageWrite(
    unitOfWork: UnitOfWork,
    revision: Revision,
    expectedVersion: NullableType<number>,
    record: RevisionActivityRecord,
  ): void {
    unitOfWork.track('revision', revision);
    unitOfWork.stage(async (manager) => {
      if (expectedVersion === null) {
        await this.revisionRepository.insert(revision, manager);
      } else {
        await this.revisionRepository.update(
          revision,
          expectedVersion,
          manager,
        );
      }
      await this.auditLedger.append(record, manager);
    });
  }

  private actorGate(
    ctx: OperationContext,
    activity: Activity,
  ): Promise<GateOutcome> {
    return ValidationGate.run(
      () => ValidationGate.uuid(ctx.actorId, 'Actor id'),
      () => ValidationGate.activityFor(AuditedEntityKind.REVISION, activity),
    );
  }
}
