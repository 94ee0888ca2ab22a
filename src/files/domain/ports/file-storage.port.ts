import { FileStorageConfig } from '../../config/file-storage-config.type';

/**
 * Persists document content. Upload flows call it before handing the
 * resulting metadata to the document lifecycle; the lifecycle itself never
 * touches file content.
 */
export abstract class FileStoragePort {
  constructor(protected readonly config: FileStorageConfig) {}

  /**
   * Writes `content` to `relativePath` under the configured root.
   * Resolves to the stored location.
   */
  abstract save(
    relativePath: string,
    content: Uint8Array,
    signal?: AbortSignal,
  ): Promise<string>;
}
