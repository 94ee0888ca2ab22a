import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { OperationContext } from '../../../database/operation-context';
import { UnitOfWork } from '../../../database/unit-of-work';
import { UnitOfWorkFactory } from '../../../database/unit-of-work.factory';
import {
  ActivityRecords,
  MatterActivityRecord,
} from '../../../audit/domain/entities/activity-record.entity';
import { Activity } from '../../../audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../../audit/domain/enums/audited-entity-kind.enum';
import { AuditLedger } from '../../../audit/domain/ports/audit-ledger.port';
import { PagedList } from '../../../utils/pagination/paged-list';
import { toPageRequest } from '../../../utils/pagination/page-request';
import {
  OperationResult,
  conflict,
  discardValue,
  forward,
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
import { CreateMatterDto } from '../../dto/create-matter.dto';
import { ListMattersDto } from '../../dto/list-matters.dto';
import { UpdateMatterDto } from '../../dto/update-matter.dto';
import { Matter, MatterProps } from '../entities/matter.entity';
import { matterPropertyMapping } from '../matter-property-mapping';
import { MatterRepository } from '../ports/matter.repository.port';

type MatterChanges = Partial<
  Pick<MatterProps, 'description' | 'isArchived' | 'isDeleted'>
>;

type MatterTransition = {
  activity: Activity;
  // Conflict message when the matter cannot make this transition
  blockedBy: (matter: Matter) => NullableType<string>;
  changes: MatterChanges;
  guard?: (
    matter: Matter,
    unitOfWork: UnitOfWork,
  ) => Promise<OperationResult<void>>;
};

/**
 * MatterLifecycleDomainService
 *
 * Every matter mutation goes through here and is written together with
 * its activity record. Preconditions are checked in a fixed order
 * (payload, ids, existence, current state, actor, activity) and the first
 * failure is returned without touching storage.
 */
@Injectable()
export class MatterLifecycleDomainService {
  private readonly logger = new Logger(MatterLifecycleDomainService.name);

  constructor(
    private readonly matterRepository: MatterRepository,
    private readonly auditLedger: AuditLedger,
    private readonly unitOfWorkFactory: UnitOfWorkFactory,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  addMatter(
    payload: NullableType<CreateMatterDto>,
    ctx: OperationContext,
  ): Promise<OperationResult<Matter>> {
    return runOperation<Matter>(
      this.logger,
      'addMatter',
      { actorId: ctx.actorId },
      async () => {
        const checked = await ValidationGate.payload(
          CreateMatterDto,
          payload,
          'Matter',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }
        const actor = await this.actorGate(ctx, Activity.CREATED);
        if (actor.status !== 'pass') {
          return ValidationGate.toResult(actor);
        }

        const scope = this.unitOfWorkFactory.begin(ctx);
        const { description } = checked.value;
        if (await this.descriptionTaken(description, scope.unitOfWork)) {
          return conflict(
            `A matter described as '${description}' already exists`,
          );
        }

        const matter = new Matter({
          id: randomUUID(),
          description,
          createdAt: new Date(),
          isArchived: false,
          isDeleted: false,
          version: 1,
        });
        this.stageWrite(
          scope.unitOfWork,
          matter,
          null,
          ActivityRecords.forMatter(
            matter.id,
            Activity.CREATED,
            ctx.actorId,
            matter.createdAt,
          ),
        );
        return scope.complete(matter);
      },
    );
  }

  updateMatter(
    matterId: string,
    payload: NullableType<UpdateMatterDto>,
    ctx: OperationContext,
  ): Promise<OperationResult<Matter>> {
    return runOperation<Matter>(
      this.logger,
      'updateMatter',
      { matterId, actorId: ctx.actorId },
      async () => {
        const checked = await ValidationGate.payload(
          UpdateMatterDto,
          payload,
          'Matter',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }

        const { description } = checked.value;
        return this.applyTransition(matterId, ctx, {
          activity: Activity.UPDATED,
          blockedBy: (matter) =>
            matter.isDeleted ? `Matter ${matter.id} is deleted` : null,
          changes: { description },
          guard: async (matter, unitOfWork) =>
            (await this.descriptionTaken(description, unitOfWork, matter.id))
              ? conflict(
                  `A matter described as '${description}' already exists`,
                )
              : succeedVoid(),
        });
      },
    );
  }

  async deleteMatter(
    matterId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    const result = await runOperation<Matter>(
      this.logger,
      'deleteMatter',
      { matterId, actorId: ctx.actorId },
      () =>
        this.applyTransition(matterId, ctx, {
          activity: Activity.DELETED,
          blockedBy: (matter) =>
            matter.isDeleted ? `Matter ${matter.id} is already deleted` : null,
          changes: { isDeleted: true },
        }),
    );
    return discardValue(result);
  }

  async restoreMatter(
    matterId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    const result = await runOperation<Matter>(
      this.logger,
      'restoreMatter',
      { matterId, actorId: ctx.actorId },
      () =>
        this.applyTransition(matterId, ctx, {
          activity: Activity.RESTORED,
          blockedBy: (matter) =>
            matter.isDeleted ? null : `Matter ${matter.id} is not deleted`,
          changes: { isDeleted: false },
          guard: async (matter, unitOfWork) =>
            (await this.descriptionTaken(
              matter.description,
              unitOfWork,
              matter.id,
            ))
              ? conflict(
                  `Another matter is now described as '${matter.description}'`,
                )
              : succeedVoid(),
        }),
    );
    return discardValue(result);
  }

  archiveMatter(
    matterId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<Matter>> {
    return runOperation<Matter>(
      this.logger,
      'archiveMatter',
      { matterId, actorId: ctx.actorId },
      () =>
        this.applyTransition(matterId, ctx, {
          activity: Activity.ARCHIVED,
          blockedBy: (matter) => {
            if (matter.isDeleted) return `Matter ${matter.id} is deleted`;
            return matter.isArchived
              ? `Matter ${matter.id} is already archived`
              : null;
          },
          changes: { isArchived: true },
        }),
    );
  }

  unarchiveMatter(
    matterId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<Matter>> {
    return runOperation<Matter>(
      this.logger,
      'unarchiveMatter',
      { matterId, actorId: ctx.actorId },
      () =>
        this.applyTransition(matterId, ctx, {
          activity: Activity.UNARCHIVED,
          blockedBy: (matter) => {
            if (matter.isDeleted) return `Matter ${matter.id} is deleted`;
            return matter.isArchived
              ? null
              : `Matter ${matter.id} is not archived`;
          },
          changes: { isArchived: false },
        }),
    );
  }

  /**
   * Records that the actor viewed a matter. Nothing about the matter
   * changes.
   */
  recordMatterView(
    matterId: string,
    ctx: OperationContext,
  ): Promise<OperationResult<void>> {
    return runOperation<void>(
      this.logger,
      'recordMatterView',
      { matterId, actorId: ctx.actorId },
      async () => {
        const scope = this.unitOfWorkFactory.begin(ctx);
        const found = await this.findMatter(matterId, scope.unitOfWork);
        if (!found.ok) return forward(found.error);
        if (found.value.isDeleted) {
          return notFound(`Matter ${matterId} does not exist`);
        }
        const actor = await this.actorGate(ctx, Activity.VIEWED);
        if (actor.status !== 'pass') return ValidationGate.toResult(actor);

        const record = ActivityRecords.forMatter(
          matterId,
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

  getMatter(
    matterId: string,
    options: { includeDeleted?: boolean } = {},
  ): Promise<OperationResult<Matter>> {
    return runOperation<Matter>(
      this.logger,
      'getMatter',
      { matterId },
      async () => {
        const found = await this.findMatter(matterId);
        if (found.ok && found.value.isDeleted && !options.includeDeleted) {
          return notFound(`Matter ${matterId} does not exist`);
        }
        return found;
      },
    );
  }

  getPaginatedMatters(
    params: NullableType<ListMattersDto> = {},
  ): Promise<OperationResult<PagedList<Matter>>> {
    return runOperation<PagedList<Matter>>(
      this.logger,
      'getPaginatedMatters',
      { orderBy: params?.orderBy },
      async () => {
        const checked = await ValidationGate.payload(
          ListMattersDto,
          params ?? {},
          'Matter query',
        );
        if (checked.status !== 'pass') {
          return ValidationGate.toResult(checked);
        }
        const query = checked.value;
        const pageCheck = ValidationGate.pageParams(query);
        if (pageCheck.status !== 'pass') {
          return ValidationGate.toResult(pageCheck);
        }
        const sort = matterPropertyMapping.resolve(query.orderBy);
        if (!sort.ok) return forward(sort.error);

        const page = await this.matterRepository.findPage(
          {
            description: query.description,
            searchQuery: query.searchQuery,
            includeArchived: query.includeArchived,
            includeDeleted: query.includeDeleted,
          },
          toPageRequest(query, this.paginationConfig()),
          sort.value,
        );
        return succeed(page);
      },
    );
  }

  matterExists(matterId: string): Promise<OperationResult<boolean>> {
    return runOperation<boolean>(
      this.logger,
      'matterExists',
      { matterId },
      async () => {
        const idCheck = ValidationGate.uuid(matterId, 'Matter id');
        if (idCheck.status !== 'pass') return ValidationGate.toResult(idCheck);
        const matter = await this.matterRepository.findById(matterId);
        return succeed(matter !== null);
      },
    );
  }

  matterDescriptionExists(
    description: string,
  ): Promise<OperationResult<boolean>> {
    return runOperation<boolean>(
      this.logger,
      'matterDescriptionExists',
      {},
      async () => {
        const present = ValidationGate.present(description, 'Description');
        if (present.status !== 'pass') return ValidationGate.toResult(present);
        return succeed(
          await this.matterRepository.descriptionExists(description.trim()),
        );
      },
    );
  }

  /**
   * Looks a matter up, preferring the state staged in `unitOfWork` over
   * the committed row.
   */
  async findMatter(
    matterId: string,
    unitOfWork?: UnitOfWork,
  ): Promise<OperationResult<Matter>> {
    const idCheck = ValidationGate.uuid(matterId, 'Matter id');
    if (idCheck.status !== 'pass') return ValidationGate.toResult(idCheck);

    const matter =
      unitOfWork?.find('matter', matterId) ??
      (await this.matterRepository.findById(matterId));
    return matter ? succeed(matter) : notFound(`Matter ${matterId} does not exist`);
  }

  private async applyTransition(
    matterId: string,
    ctx: OperationContext,
    transition: MatterTransition,
  ): Promise<OperationResult<Matter>> {
    const scope = this.unitOfWorkFactory.begin(ctx);
    const found = await this.findMatter(matterId, scope.unitOfWork);
    if (!found.ok) return forward(found.error);
    const current = found.value;

    const blocked = transition.blockedBy(current);
    if (blocked) return conflict(blocked);

    const actor = await this.actorGate(ctx, transition.activity);
    if (actor.status !== 'pass') return ValidationGate.toResult(actor);

    if (transition.guard) {
      const guarded = await transition.guard(current, scope.unitOfWork);
      if (!guarded.ok) return forward(guarded.error);
    }

    const next = new Matter({
      ...current,
      ...transition.changes,
      version: current.version + 1,
    });
    this.stageWrite(
      scope.unitOfWork,
      next,
      current.version,
      ActivityRecords.forMatter(next.id, transition.activity, ctx.actorId),
    );
    return scope.complete(next);
  }

  private stageWrite(
    unitOfWork: UnitOfWork,
    matter: Matter,
    expectedVersion: NullableType<number>,
    record: MatterActivityRecord,
  ): void {
    unitOfWork.track('matter', matter);
    unitOfWork.stage(async (manager) => {
      if (expectedVersion === null) {
        await this.matterRepository.insert(matter, manager);
      } else {
        await this.matterRepository.update(matter, expectedVersion, manager);
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
      () => ValidationGate.activityFor(AuditedEntityKind.MATTER, activity),
    );
  }

  private async descriptionTaken(
    description: string,
    unitOfWork: UnitOfWork,
    excludeId?: string,
  ): Promise<boolean> {
    const key = description.toLowerCase();
    const staged = unitOfWork.tracked('matter');
    if (
      staged.some(
        (matter) =>
          matter.id !== excludeId &&
          !matter.isDeleted &&
          matter.description.toLowerCase() === key,
      )
    ) {
      return true;
    }

    // Staged state supersedes the committed rows of tracked matters
    const ignored = staged.map((matter) => matter.id);
    if (excludeId) ignored.push(excludeId);
    return this.matterRepository.descriptionExists(description, ignored);
  }

  private paginationConfig() {
    return this.configService.getOrThrow('pagination', { infer: true });
  }
}
