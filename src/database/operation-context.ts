import { UnitOfWork } from './unit-of-work';

export interface OperationContext {
  // Resolved by the caller; authentication happens outside this library
  actorId: string;
  signal?: AbortSignal;
  // When supplied, operations only stage their changes and the caller commits
  unitOfWork?: UnitOfWork;
}
