import { registerAs } from '@nestjs/config';
import { IsOptional, IsString } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { FileStorageConfig } from './file-storage-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  FILE_STORAGE_ROOT?: string;
}

// Resolved once at startup and handed to storage adapters through DI
export default registerAs<FileStorageConfig>('fileStorage', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    rootPath: process.env.FILE_STORAGE_ROOT || './storage',
  };
});
