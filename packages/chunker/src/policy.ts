import type { ChunkingPolicy } from '@doc-chunks/types';
import { ChunkingConfigError } from './errors.js';

/** デフォルトの閾値 */
export const DEFAULT_CHUNKING_POLICY: Readonly<ChunkingPolicy> = {
  minTokens: 80,
  targetTokens: 220,
  maxTokens: 300,
  sentenceOverlap: 1,
};

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ChunkingConfigError(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * 閾値を検証する
 * minTokens < targetTokens <= maxTokens、sentenceOverlap >= 0
 */
export function validateChunkingPolicy(policy: ChunkingPolicy): ChunkingPolicy {
  assertPositiveInteger(policy.minTokens, 'minTokens');
  assertPositiveInteger(policy.targetTokens, 'targetTokens');
  assertPositiveInteger(policy.maxTokens, 'maxTokens');

  if (!Number.isInteger(policy.sentenceOverlap) || policy.sentenceOverlap < 0) {
    throw new ChunkingConfigError(
      `sentenceOverlap must be a non-negative integer (got ${policy.sentenceOverlap})`
    );
  }

  if (policy.minTokens >= policy.targetTokens) {
    throw new ChunkingConfigError(
      `minTokens (${policy.minTokens}) must be less than targetTokens (${policy.targetTokens})`
    );
  }

  if (policy.targetTokens > policy.maxTokens) {
    throw new ChunkingConfigError(
      `targetTokens (${policy.targetTokens}) must not exceed maxTokens (${policy.maxTokens})`
    );
  }

  return { ...policy };
}
