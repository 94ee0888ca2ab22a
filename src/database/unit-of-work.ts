import { Logger } from '@nestjs/common';
import { DataSource, EntityManager, QueryFailedError } from 'typeorm';
import { Matter } from '../matters/domain/entities/matter.entity';
import { Document } from '../documents/domain/entities/document.entity';
import { Revision } from '../revisions/domain/entities/revision.entity';
import {
  OperationErrorCode,
  OperationResult,
  conflict,
  fail,
  succeedVoid,
} from '../utils/results/operation-result';
import {
  ConcurrencyConflictError,
  OperationCancelledError,
} from './unit-of-work.errors';

export type StagedWrite = (manager: EntityManager) => Promise<void>;

export type TrackedEntities = {
  matter: Matter;
  document: Document;
  revision: Revision;
};

export type TrackedKind = keyof TrackedEntities;

type IdentityMap = { [K in TrackedKind]: Map<string, TrackedEntities[K]> };

const UNIQUE_VIOLATION_CODES: readonly unknown[] = [
  '23505', // postgres
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
];

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    UNIQUE_VIOLATION_CODES.includes(driverError.code)
  );
}

/**
 * Unit of Work
 *
 * Collects entity writes and ledger appends for one caller request and
 * commits them in a single database transaction, so a state change and its
 * activity record are persisted together or not at all.
 *
 * Entities touched by staged writes are kept in an identity map. Lookups made
 * by later operations enlisted in the same unit of work see the staged state
 * rather than the committed one.
 */
export class UnitOfWork {
  private readonly logger = new Logger(UnitOfWork.name);
  private staged: StagedWrite[] = [];
  private identityMap: IdentityMap = UnitOfWork.emptyIdentityMap();

  constructor(
    private readonly dataSource: DataSource,
    readonly signal?: AbortSignal,
  ) {}

  stage(write: StagedWrite): void {
    this.staged.push(write);
  }

  track<K extends TrackedKind>(kind: K, entity: TrackedEntities[K]): void {
    this.identityMap[kind].set(entity.id, entity);
  }

  find<K extends TrackedKind>(
    kind: K,
    id: string,
  ): TrackedEntities[K] | undefined {
    return this.identityMap[kind].get(id);
  }

  tracked<K extends TrackedKind>(kind: K): TrackedEntities[K][] {
    return [...this.identityMap[kind].values()];
  }

  hasChanges(): boolean {
    return this.staged.length > 0;
  }

  /**
   * Commits everything staged so far. With nothing staged this is a
   * successful no-op. The staged writes are discarded whatever the outcome.
   */
  async saveChanges(): Promise<OperationResult<void>> {
    if (!this.hasChanges()) {
      return succeedVoid();
    }

    const writes = this.staged;
    this.discard();

    if (this.signal?.aborted) {
      return fail(
        OperationErrorCode.CANCELLED,
        new OperationCancelledError().message,
      );
    }

    try {
      await this.dataSource.transaction(async (manager) => {
        for (const write of writes) {
          this.throwIfAborted();
          await write(manager);
        }
        this.throwIfAborted();
      });
      return succeedVoid();
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        return fail(OperationErrorCode.CANCELLED, error.message);
      }
      if (error instanceof ConcurrencyConflictError) {
        return conflict(error.message);
      }
      if (isUniqueViolation(error)) {
        return conflict(
          'A concurrent operation already wrote a conflicting row',
        );
      }

      this.logger.error(
        {
          operation: 'saveChanges',
          code: OperationErrorCode.STORAGE_FAULT,
          message: error instanceof Error ? error.message : String(error),
          stagedWrites: writes.length,
        },
        error instanceof Error ? error.stack : undefined,
      );
      return fail(
        OperationErrorCode.STORAGE_FAULT,
        'The changes could not be saved',
      );
    }
  }

  discard(): void {
    this.staged = [];
    this.identityMap = UnitOfWork.emptyIdentityMap();
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new OperationCancelledError();
    }
  }

  private static emptyIdentityMap(): IdentityMap {
    return {
      matter: new Map(),
      document: new Map(),
      revision: new Map(),
    };
  }
}
