import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  OperationResult,
  forward,
  succeed,
} from '../utils/results/operation-result';
import { OperationContext } from './operation-context';
import { UnitOfWork } from './unit-of-work';

/**
 * The unit of work one operation writes through: either the caller's shared
 * one (the operation only stages) or a private one committed by `complete`.
 */
export class UnitOfWorkScope {
  constructor(
    readonly unitOfWork: UnitOfWork,
    readonly owned: boolean,
  ) {}

  async complete<T>(value: T): Promise<OperationResult<T>> {
    if (!this.owned) {
      return succeed(value);
    }
    const saved = await this.unitOfWork.saveChanges();
    return saved.ok ? succeed(value) : forward(saved.error);
  }
}

@Injectable()
export class UnitOfWorkFactory {
  constructor(private readonly dataSource: DataSource) {}

  create(signal?: AbortSignal): UnitOfWork {
    return new UnitOfWork(this.dataSource, signal);
  }

  begin(ctx: OperationContext): UnitOfWorkScope {
    return ctx.unitOfWork
      ? new UnitOfWorkScope(ctx.unitOfWork, false)
      : new UnitOfWorkScope(this.create(ctx.signal), true);
  }
}
