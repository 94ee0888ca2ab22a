import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { DocumentRepository } from '../documents/domain/ports/document.repository.port';
import { MatterRepository } from '../matters/domain/ports/matter.repository.port';
import { RevisionRepository } from '../revisions/domain/ports/revision.repository.port';
import { PagedList } from '../utils/pagination/paged-list';
import { PageParamsDto } from '../utils/pagination/page-params.dto';
import { toPageRequest } from '../utils/pagination/page-request';
import {
  OperationResult,
  forward,
  succeed,
} from '../utils/results/operation-result';
import { runOperation } from '../utils/results/operation-runner';
import {
  GateOutcome,
  ValidationGate,
} from '../utils/validation/validation-gate';
import { NullableType } from '../utils/types/nullable.type';
import {
  activityRecordPropertyMapping,
  transferRecordPropertyMapping,
} from './domain/activity-record-property-mapping';
import { ActivityRecord } from './domain/entities/activity-record.entity';
import { AuditedEntityKind } from './domain/enums/audited-entity-kind.enum';
import { TransferDirection } from './domain/enums/transfer-direction.enum';
import {
  ActivityQuery,
  AuditLedger,
  EntityActivityQuery,
  TransferActivityQuery,
} from './domain/ports/audit-ledger.port';

/**
 * Audit Query Service
 *
 * Read side of the activity ledgers. The audited entity must exist, but
 * may be deleted: the history of a deleted entity stays queryable.
 */
@Injectable()
export class AuditQueryService {
  private readonly logger = new Logger(AuditQueryService.name);

  constructor(
    private readonly auditLedger: AuditLedger,
    private readonly matterRepository: MatterRepository,
    private readonly documentRepository: DocumentRepository,
    private readonly revisionRepository: RevisionRepository,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  getPaginatedAudits(
    query: NullableType<ActivityQuery>,
    params: NullableType<PageParamsDto> = {},
  ): Promise<OperationResult<PagedList<ActivityRecord>>> {
    return runOperation<PagedList<ActivityRecord>>(
      this.logger,
      'getPaginatedAudits',
      { kind: query?.kind, orderBy: params?.orderBy },
      async () => {
        if (!query) {
          return ValidationGate.toResult(
            ValidationGate.badInput('Activity query must be provided'),
          );
        }
        const kind = ValidationGate.enumMember(
          query.kind,
          AuditedEntityKind,
          'Entity kind',
        );
        if (kind.status !== 'pass') return ValidationGate.toResult(kind);

        const checked = await ValidationGate.payload(
          PageParamsDto,
          params ?? {},
          'Page parameters',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }

        const target =
          query.kind === AuditedEntityKind.MATTER_DOCUMENT
            ? await this.transferTargetGate(query)
            : await this.entityTargetGate(query);
        if (target.status !== 'pass') return ValidationGate.toResult(target);

        const pageCheck = ValidationGate.pageParams(checked.value);
        if (pageCheck.status !== 'pass') {
          return ValidationGate.toResult(pageCheck);
        }
        const page = toPageRequest(
          checked.value,
          this.configService.getOrThrow('pagination', { infer: true }),
        );

        if (query.kind === AuditedEntityKind.MATTER_DOCUMENT) {
          const sort = transferRecordPropertyMapping.resolve(
            checked.value.orderBy,
          );
          if (!sort.ok) return forward(sort.error);
          return succeed<PagedList<ActivityRecord>>(
            await this.auditLedger.queryTransfers(query, page, sort.value),
          );
        }

        const sort = activityRecordPropertyMapping.resolve(
          checked.value.orderBy,
        );
        if (!sort.ok) return forward(sort.error);
        return succeed<PagedList<ActivityRecord>>(
          await this.auditLedger.queryByEntity(query, page, sort.value),
        );
      },
    );
  }

  private entityTargetGate(query: EntityActivityQuery): Promise<GateOutcome> {
    return ValidationGate.run(
      () => ValidationGate.uuid(query.entityId, `${query.kind} id`),
      () =>
        ValidationGate.exists(
          () => this.entityExists(query),
          `${query.kind} ${query.entityId}`,
        ),
    );
  }

  private transferTargetGate(
    query: TransferActivityQuery,
  ): Promise<GateOutcome> {
    const { documentId, matterId, direction } = query;
    return ValidationGate.run(
      () =>
        documentId === undefined && matterId === undefined
          ? ValidationGate.badInput(
              'A document id or a matter id is required to query transfers',
            )
          : ValidationGate.PASS,
      () =>
        direction === undefined
          ? ValidationGate.PASS
          : ValidationGate.enumMember(
              direction,
              TransferDirection,
              'Transfer direction',
            ),
      () =>
        documentId === undefined
          ? ValidationGate.PASS
          : ValidationGate.uuid(documentId, 'Document id'),
      () =>
        matterId === undefined
          ? ValidationGate.PASS
          : ValidationGate.uuid(matterId, 'Matter id'),
      () =>
        documentId === undefined
          ? ValidationGate.PASS
          : ValidationGate.exists(
              async () =>
                (await this.documentRepository.findById(documentId)) !== null,
              `Document ${documentId}`,
            ),
      () =>
        matterId === undefined
          ? ValidationGate.PASS
          : ValidationGate.exists(
              async () =>
                (await this.matterRepository.findById(matterId)) !== null,
              `Matter ${matterId}`,
            ),
    );
  }

  private async entityExists(query: EntityActivityQuery): Promise<boolean> {
    switch (query.kind) {
      case AuditedEntityKind.MATTER:
        return (await this.matterRepository.findById(query.entityId)) !== null;
      case AuditedEntityKind.DOCUMENT:
        return (
          (await this.documentRepository.findById(query.entityId)) !== null
        );
      case AuditedEntityKind.REVISION:
        return (
          (await this.revisionRepository.findById(query.entityId)) !== null
        );
    }
  }
}
