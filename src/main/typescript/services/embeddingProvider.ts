/**
 * INPUT: texts to embed
 * OUTPUT: one fixed-length vector per text
 * POS: service layer, embedding providers behind a single interface
 *
 * - HashingEmbeddingProvider: offline and deterministic; hashed word and
 *   character-trigram features folded into a fixed number of dimensions.
 * - OpenAiEmbeddingProvider: OpenAI embeddings endpoint with batching and
 *   exponential backoff on 429 / 5xx / network resets.
 */

import OpenAI from 'openai';
import { l2Normalize } from '../utils/vectorMath';

export interface EmbeddingProvider {
  /** part of the cache key; changes whenever vectors would change */
  readonly id: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

// ─── Hashing provider ────────────────────────────────────────

const HASHING_DIMENSIONS = 384;
const WORD_WEIGHT = 1;
const TRIGRAM_WEIGHT = 0.5;

/** 32-bit FNV-1a */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

function foldAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;

  constructor(readonly dimensions = HASHING_DIMENSIONS) {
    this.id = `hashing-v1-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const words = foldAccents(text.toLowerCase()).match(/[\p{L}\p{N}]+/gu) ?? [];

    const add = (feature: string, weight: number): void => {
      const h = fnv1a(feature);
      // top bit picks the sign so colliding features partly cancel
      const sign = h & 0x80000000 ? -1 : 1;
      vector[h % this.dimensions] += sign * weight;
    };

    for (const word of words) {
      add(`w:${word}`, WORD_WEIGHT);
      const padded = ` ${word} `;
      for (let i = 0; i + 3 <= padded.length; i++) {
        add(`t:${padded.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
      }
    }
    return l2Normalize(vector);
  }
}

// ─── OpenAI provider ─────────────────────────────────────────

/** The slice of the OpenAI client this provider calls */
export interface EmbeddingsApi {
  create(params: { model: string; input: string[] }): Promise<{
    data: Array<{ index: number; embedding: number[] }>;
  }>;
}

export interface OpenAiEmbeddingOptions {
  apiKey: string;
  model: string;
  dimensions: number;
  batchSize: number;
  maxRetries: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  /** injected for tests; defaults to the OpenAI SDK client */
  api?: EmbeddingsApi;
}

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

const DEFAULT_OPENAI_OPTIONS = {
  batchSize: 100,
  maxRetries: 3,
  initialRetryDelayMs: 1000,
  maxRetryDelayMs: 60000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
  return Math.min(initialMs * Math.pow(2, attempt), maxMs);
}

export function isRetryableError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('status' in err && typeof err.status === 'number') {
    return err.status === 429 || (err.status >= 500 && err.status < 600);
  }
  if ('code' in err && typeof err.code === 'string') {
    return ['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'].includes(err.code);
  }
  return false;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  readonly dimensions: number;
  private readonly api: EmbeddingsApi;
  private readonly options: Omit<OpenAiEmbeddingOptions, 'api'>;

  constructor(options: Partial<OpenAiEmbeddingOptions> & { apiKey: string; model: string }) {
    this.options = {
      ...DEFAULT_OPENAI_OPTIONS,
      dimensions: MODEL_DIMENSIONS[options.model] ?? 1536,
      ...options,
    };
    this.id = `openai:${options.model}`;
    this.dimensions = this.options.dimensions;
    this.api = options.api ?? new OpenAI({ apiKey: options.apiKey }).embeddings;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      const batch = texts.slice(i, i + this.options.batchSize);
      results.push(...(await this.embedBatch(batch)));
    }
    return results;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const { model, maxRetries, initialRetryDelayMs, maxRetryDelayMs } = this.options;
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.api.create({ model, input: batch });
        const sorted = [...response.data].sort((a, b) => a.index - b.index);
        if (sorted.length !== batch.length) {
          throw new Error(`expected ${batch.length} embeddings, got ${sorted.length}`);
        }
        return sorted.map((d) => d.embedding);
      } catch (err) {
        if (attempt >= maxRetries || !isRetryableError(err)) throw err;
        const delay = backoffDelay(attempt, initialRetryDelayMs, maxRetryDelayMs);
        console.warn(`[embeddingProvider] retry ${attempt + 1}/${maxRetries} in ${delay}ms`);
        await sleep(delay);
      }
    }
  }
}
