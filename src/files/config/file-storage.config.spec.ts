import fileStorageConfig from './file-storage.config';

describe('fileStorage config', () => {
  const originalRoot = process.env.FILE_STORAGE_ROOT;

  afterEach(() => {
    if (originalRoot === undefined) {
      delete process.env.FILE_STORAGE_ROOT;
    } else {
      process.env.FILE_STORAGE_ROOT = originalRoot;
    }
  });

  it('should default the root path', () => {
    delete process.env.FILE_STORAGE_ROOT;

    expect(fileStorageConfig()).toEqual({ rootPath: './storage' });
  });

  it('should read the root path from the environment', () => {
    process.env.FILE_STORAGE_ROOT = '/srv/matters';

    expect(fileStorageConfig()).toEqual({ rootPath: '/srv/matters' });
  });
});
