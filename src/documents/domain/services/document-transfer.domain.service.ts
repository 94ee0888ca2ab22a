import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { OperationContext } from '../../../database/operation-context';
import { UnitOfWorkFactory } from '../../../database/unit-of-work.factory';
import { ActivityRecords } from '../../../audit/domain/entities/activity-record.entity';
import { Activity } from '../../../audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../../audit/domain/enums/audited-entity-kind.enum';
import { AuditLedger } from '../../../audit/domain/ports/audit-ledger.port';
import { MatterLifecycleDomainService } from '../../../matters/domain/services/matter-lifecycle.domain.service';
import {
  OperationResult,
  conflict,
  forward,
} from '../../../utils/results/operation-result';
import { runOperation } from '../../../utils/results/operation-runner';
import { ValidationGate } from '../../../utils/validation/validation-gate';
import { Document } from '../entities/document.entity';
import { TransferMode } from '../enums/transfer-mode.enum';
import { DocumentLifecycleDomainService } from './document-lifecycle.domain.service';

/**
 * Moves or copies a document between matters.
 *
 * Every transfer is recorded twice in the matter-document ledger: a FROM
 * record on the source matter and a TO record on the target, both with the
 * same timestamp and the id of the transferred document. A copy is a new
 * document (with its own revision 1 and CREATED records) in the target.
 */
@Injectable()
export class DocumentTransferDomainService {
  private readonly logger = new Logger(DocumentTransferDomainService.name);

  constructor(
    private readonly documentLifecycleService: DocumentLifecycleDomainService,
    private readonly matterLifecycleService: MatterLifecycleDomainService,
    private readonly auditLedger: AuditLedger,
    private readonly unitOfWorkFactory: UnitOfWorkFactory,
  ) {}

  /**
   * @returns the moved document, or the new copy
   */
  transferDocument(
    sourceMatterId: string,
    targetMatterId: string,
    documentId: string,
    mode: TransferMode,
    ctx: OperationContext,
  ): Promise<OperationResult<Document>> {
    return runOperation<Document>(
      this.logger,
      'transferDocument',
      { sourceMatterId, targetMatterId, documentId, mode, actorId: ctx.actorId },
      async () => {
        const input = await ValidationGate.run(
          () => ValidationGate.uuid(sourceMatterId, 'Source matter id'),
          () => ValidationGate.uuid(targetMatterId, 'Target matter id'),
          () => ValidationGate.uuid(documentId, 'Document id'),
          () => ValidationGate.enumMember(mode, TransferMode, 'Transfer mode'),
          () =>
            sourceMatterId.toLowerCase() === targetMatterId.toLowerCase()
              ? ValidationGate.badInput(
                  'Source and target matter must be different',
                )
              : ValidationGate.PASS,
        );
        if (input.status !== 'pass') return ValidationGate.toResult(input);

        const scope = this.unitOfWorkFactory.begin(ctx);
        const unitOfWork = scope.unitOfWork;

        const source = await this.matterLifecycleService.findMatter(
          sourceMatterId,
          unitOfWork,
        );
        if (!source.ok) return forward(source.error);

        const target = await this.matterLifecycleService.findMatter(
          targetMatterId,
          unitOfWork,
        );
        if (!target.ok) return forward(target.error);
        if (target.value.isDeleted) {
          return conflict(`Target matter ${targetMatterId} is deleted`);
        }
        if (target.value.isArchived) {
          return conflict(`Target matter ${targetMatterId} is archived`);
        }

        const found = await this.documentLifecycleService.findDocument(
          documentId,
          unitOfWork,
        );
        if (!found.ok) return forward(found.error);
        const document = found.value;
        if (document.isDeleted) {
          return conflict(`Document ${documentId} is deleted`);
        }
        if (mode === TransferMode.MOVE) {
          if (document.matterId !== source.value.id) {
            return conflict(
              `Document ${documentId} does not belong to matter ${sourceMatterId}`,
            );
          }
          if (document.isCheckedOut) {
            return conflict(
              `Document ${documentId} is checked out and cannot be moved`,
            );
          }
        }

        if (
          await this.documentLifecycleService.fileNameTaken(
            target.value.id,
            document.fileName,
            unitOfWork,
          )
        ) {
          return conflict(
            `Matter ${targetMatterId} already has a document named '${document.fileName}'`,
          );
        }

        const activity =
          mode === TransferMode.MOVE ? Activity.MOVED : Activity.COPIED;
        const actor = await ValidationGate.run(
          () => ValidationGate.uuid(ctx.actorId, 'Actor id'),
          () =>
            ValidationGate.activityFor(
              AuditedEntityKind.MATTER_DOCUMENT,
              activity,
            ),
        );
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const transferredAt = new Date();
        let result: Document;
        if (mode === TransferMode.MOVE) {
          result = new Document({
            ...document,
            matterId: target.value.id,
            version: document.version + 1,
          });
          this.documentLifecycleService.stageWrite(
            unitOfWork,
            result,
            document.version,
            null,
          );
        } else {
          result = new Document({
            ...document,
            id: randomUUID(),
            matterId: target.value.id,
            isCheckedOut: false,
            checkedOutBy: null,
            createdAt: transferredAt,
            version: 1,
          });
          this.documentLifecycleService.stageNewDocument(
            unitOfWork,
            result,
            ctx.actorId,
          );
        }

        const [from, to] = ActivityRecords.transferPair({
          sourceMatterId: source.value.id,
          targetMatterId: target.value.id,
          documentId: document.id,
          activity,
          userId: ctx.actorId,
          createdAt: transferredAt,
        });
        unitOfWork.stage(async (manager) => {
          await this.auditLedger.append(from, manager);
          await this.auditLedger.append(to, manager);
        });

        return scope.complete(result);
      },
    );
  }
}
