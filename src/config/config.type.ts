import { AppConfig } from './app-config.type';
import { PaginationConfig } from './pagination-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { FileStorageConfig } from '../files/config/file-storage-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  pagination: PaginationConfig;
  fileStorage: FileStorageConfig;
};
