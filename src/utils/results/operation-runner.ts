import { Logger } from '@nestjs/common';
import { OperationErrorCode, OperationResult, fail } from './operation-result';

export type OperationLogContext = Record<
  string,
  string | number | boolean | null | undefined
>;

/**
 * Runs one lifecycle operation at the service boundary.
 *
 * Expected failures are logged as structured warnings. Anything thrown is a
 * storage fault: it is logged with its stack and returned as STORAGE_FAULT,
 * never rethrown.
 */
export async function runOperation<T>(
  logger: Logger,
  operation: string,
  context: OperationLogContext,
  body: () => Promise<OperationResult<T>>,
): Promise<OperationResult<T>> {
  let result: OperationResult<T>;
  try {
    result = await body();
  } catch (error) {
    logger.error(
      {
        operation,
        code: OperationErrorCode.STORAGE_FAULT,
        message: error instanceof Error ? error.message : String(error),
        ...context,
      },
      error instanceof Error ? error.stack : undefined,
    );
    return fail(
      OperationErrorCode.STORAGE_FAULT,
      `${operation} failed due to a storage error`,
    );
  }

  // Storage faults coming back from a commit were already logged as errors
  if (!result.ok && result.error.code !== OperationErrorCode.STORAGE_FAULT) {
    logger.warn({
      operation,
      code: result.error.code,
      message: result.error.message,
      ...context,
    });
  }
  return result;
}
