/**
 * 保存レコードのスキーマ（読み込み時の検証用）
 */

import { z } from 'zod';
import { CHUNK_ID_PATTERN } from '@doc-chunks/types';

const chunkBaseSchema = z.object({
  chunkId: z.string().regex(CHUNK_ID_PATTERN),
  documentId: z.string(),
  text: z.string(),
  tokenCount: z.number().int().nonnegative(),
  sectionPath: z.array(z.string()),
  paragraphIndex: z.number().int().nonnegative(),
  position: z.number().int().nonnegative(),
  storedAt: z.coerce.date(),
});

/**
 * チャンクレコード
 * split以外のsubchunkIndexは取り除く（有無がIDの意味を持つため）
 */
export const storedChunkSchema = z.discriminatedUnion('chunkType', [
  chunkBaseSchema.extend({ chunkType: z.literal('paragraph') }),
  chunkBaseSchema.extend({ chunkType: z.literal('merged') }),
  chunkBaseSchema.extend({
    chunkType: z.literal('split'),
    subchunkIndex: z.number().int().nonnegative(),
  }),
]);

const tocEntrySchema = z.object({
  level: z.number().int().nonnegative(),
  title: z.string(),
  path: z.array(z.string()),
});

/**
 * 文書レコード
 */
export const documentRecordSchema = z.object({
  documentId: z.string(),
  title: z.string(),
  abstract: z.string(),
  toc: z.array(tocEntrySchema),
  sourcePath: z.string().optional(),
  createdAt: z.coerce.date(),
});
