/**
 * @doc-chunks/storage
 * チャンクと文書レコードの永続化
 */

export { FileChunkStorage, StorageFormatError } from './file-chunk-storage.js';
export type { FileChunkStorageOptions } from './file-chunk-storage.js';
export { storedChunkSchema, documentRecordSchema } from './record-schema.js';
