export type FileStorageConfig = {
  rootPath: string;
};
