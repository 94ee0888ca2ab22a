import { ClassConstructor, plainToInstance } from 'class-transformer';
import { isEnum, isUUID, validate } from 'class-validator';
import {
  OperationErrorCode,
  OperationResult,
  fail,
} from '../results/operation-result';
import { describeErrors } from './validation-errors';
import { Activity } from '../../audit/domain/enums/activity.enum';
import { AuditedEntityKind } from '../../audit/domain/enums/audited-entity-kind.enum';
import { isActivityAllowed } from '../../audit/domain/entities/activity-record.entity';

export type GateFailure = {
  status: 'not-found' | 'bad-input';
  reason: string;
};

export type GateOutcome = { status: 'pass' } | GateFailure;

export type PayloadOutcome<T> = { status: 'pass'; value: T } | GateFailure;

export type GateCheck = () => GateOutcome | Promise<GateOutcome>;

/**
 * Validation Gate
 *
 * Stateless precondition checks shared by every lifecycle operation so that
 * "does X exist" and "is X well formed" mean the same thing everywhere.
 *
 * Checks are passed as thunks to `run`, which evaluates them in order and
 * stops at the first outcome that is not `pass`.
 */
export class ValidationGate {
  static readonly PASS: GateOutcome = Object.freeze({ status: 'pass' });

  static notFound(reason: string): GateFailure {
    return { status: 'not-found', reason };
  }

  static badInput(reason: string): GateFailure {
    return { status: 'bad-input', reason };
  }

  static async run(...checks: GateCheck[]): Promise<GateOutcome> {
    for (const check of checks) {
      const outcome = await check();
      if (outcome.status !== 'pass') {
        return outcome;
      }
    }
    return ValidationGate.PASS;
  }

  static present(value: unknown, name: string): GateOutcome {
    return value === null || value === undefined
      ? ValidationGate.badInput(`${name} must be provided`)
      : ValidationGate.PASS;
  }

  static uuid(value: unknown, name: string): GateOutcome {
    if (typeof value !== 'string' || value.trim() === '') {
      return ValidationGate.badInput(`${name} must be a non-empty identifier`);
    }
    return isUUID(value)
      ? ValidationGate.PASS
      : ValidationGate.badInput(`${name} must be a UUID`);
  }

  static enumMember(
    value: unknown,
    enumeration: object,
    name: string,
  ): GateOutcome {
    return isEnum(value, enumeration)
      ? ValidationGate.PASS
      : ValidationGate.badInput(
          `${name} must be one of: ${Object.values(enumeration).join(', ')}`,
        );
  }

  static positiveInteger(value: unknown, name: string): GateOutcome {
    return typeof value === 'number' && Number.isInteger(value) && value > 0
      ? ValidationGate.PASS
      : ValidationGate.badInput(`${name} must be greater than 0`);
  }

  /**
   * Page number and size are optional; when given they must be positive
   * integers.
   */
  static pageParams(params: {
    pageNumber?: number;
    pageSize?: number;
  }): GateOutcome {
    if (params.pageNumber !== undefined) {
      const outcome = ValidationGate.positiveInteger(
        params.pageNumber,
        'Page number',
      );
      if (outcome.status !== 'pass') return outcome;
    }
    if (params.pageSize !== undefined) {
      return ValidationGate.positiveInteger(params.pageSize, 'Page size');
    }
    return ValidationGate.PASS;
  }

  static activityFor(kind: AuditedEntityKind, activity: Activity): GateOutcome {
    return isActivityAllowed(kind, activity)
      ? ValidationGate.PASS
      : ValidationGate.badInput(`${activity} is not a ${kind} activity`);
  }

  static async exists(
    lookup: () => Promise<boolean>,
    description: string,
  ): Promise<GateOutcome> {
    return (await lookup())
      ? ValidationGate.PASS
      : ValidationGate.notFound(`${description} does not exist`);
  }

  /**
   * Converts a plain payload into its DTO class and runs class-validator on
   * it. Properties without validation decorators are rejected.
   */
  static async payload<T extends object>(
    dtoClass: ClassConstructor<T>,
    payload: unknown,
    name: string,
  ): Promise<PayloadOutcome<T>> {
    if (payload === null || payload === undefined) {
      return ValidationGate.badInput(`${name} must be provided`);
    }
    if (typeof payload !== 'object' || Array.isArray(payload)) {
      return ValidationGate.badInput(`${name} must be an object`);
    }

    const instance = plainToInstance(dtoClass, payload);
    const errors = await validate(instance, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      return ValidationGate.badInput(
        `${name} is invalid: ${describeErrors(errors)}`,
      );
    }
    return { status: 'pass', value: instance };
  }

  static toResult<T>(outcome: GateFailure): OperationResult<T> {
    return fail(
      outcome.status === 'not-found'
        ? OperationErrorCode.NOT_FOUND
        : OperationErrorCode.VALIDATION_FAILURE,
      outcome.reason,
    );
  }
}
