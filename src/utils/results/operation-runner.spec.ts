import { Logger } from '@nestjs/common';
import {
  OperationErrorCode,
  conflict,
  fail,
  succeed,
} from './operation-result';
import { runOperation } from './operation-runner';

describe('runOperation', () => {
  const logger = new Logger('RunOperationTest');
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass successes through silently', async () => {
    const result = await runOperation(logger, 'getMatter', {}, async () =>
      succeed(42),
    );

    expect(result).toEqual({ ok: true, value: 42 });
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should log expected failures as structured warnings', async () => {
    const result = await runOperation(
      logger,
      'deleteMatter',
      { matterId: 'm-1', actorId: 'u-1' },
      async () => conflict<void>('Matter m-1 is already deleted'),
    );

    expect(result.ok).toBe(false);
    expect(warnSpy).toHaveBeenCalledWith({
      operation: 'deleteMatter',
      code: OperationErrorCode.CONFLICT,
      message: 'Matter m-1 is already deleted',
      matterId: 'm-1',
      actorId: 'u-1',
    });
  });

  it('should turn a throw into a logged storage fault', async () => {
    const result = await runOperation(
      logger,
      'addMatter',
      { actorId: 'u-1' },
      async () => {
        throw new Error('connection reset');
      },
    );

    expect(result).toEqual({
      ok: false,
      error: {
        code: OperationErrorCode.STORAGE_FAULT,
        message: 'addMatter failed due to a storage error',
      },
    });
    expect(errorSpy).toHaveBeenCalledWith(
      {
        operation: 'addMatter',
        code: OperationErrorCode.STORAGE_FAULT,
        message: 'connection reset',
        actorId: 'u-1',
      },
      expect.any(String),
    );
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should not warn again about a storage fault from a commit', async () => {
    await runOperation(logger, 'addMatter', {}, async () =>
      fail<void>(OperationErrorCode.STORAGE_FAULT, 'The changes could not be saved'),
    );

    expect(warnSpy).not.toHaveBeenCalled();
  });
});
