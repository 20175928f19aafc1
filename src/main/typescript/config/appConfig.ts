/**
 * INPUT: process.env (loaded from .env by dotenv in index.ts)
 * OUTPUT: frozen AppConfig
 * POS: config layer, single place where environment variables are read
 */

import * as path from 'path';

export type EmbeddingProviderKind = 'hashing' | 'openai';
export type SimilarityBackend = 'fuzzball' | 'indel';

export interface Thresholds {
  semantic: number;
  expertTip: number;
  seeAlso: number;
  fuzzy: number;
  typo: number;
}

export interface AppConfig {
  port: number;
  line: {
    channelAccessToken: string;
    channelSecret: string;
  };
  files: {
    rules: string;
    lexicon: string;
    responses: string;
    embeddingCache: string;
  };
  embedding: {
    provider: EmbeddingProviderKind;
    openAiApiKey: string;
    openAiModel: string;
  };
  similarityBackend: SimilarityBackend;
  thresholds: Thresholds;
  queryCache: {
    size: number;
    ttlMs: number;
  };
}

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = {
  semantic: 0.3,
  expertTip: 0.7,
  seeAlso: 0.8,
  fuzzy: 0.7,
  typo: 0.8,
};

type Env = Record<string, string | undefined>;

// ─── Parsing helpers ─────────────────────────────────────────

function readNumber(env: Env, key: string, fallback: number, integer = false): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0 || (integer && !Number.isInteger(n))) {
    console.warn(`[appConfig] ${key}="${raw}" is not a valid number, using ${fallback}`);
    return fallback;
  }
  return n;
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const found = choices.find((c) => c === raw);
  if (!found) {
    console.warn(`[appConfig] ${key}="${raw}" must be one of ${choices.join(', ')}, using ${fallback}`);
    return fallback;
  }
  return found;
}

function readPath(env: Env, key: string, fallback: string): string {
  return path.resolve(process.cwd(), env[key]?.trim() || fallback);
}

// ─── Loader ───────────────────────────────────────────────────

export function loadAppConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: readNumber(env, 'PORT', 3000, true),
    line: {
      channelAccessToken: env['LINE_CHANNEL_ACCESS_TOKEN'] || '',
      channelSecret: env['LINE_CHANNEL_SECRET'] || '',
    },
    files: {
      rules: readPath(env, 'RULES_FILE', 'data/rules.json'),
      lexicon: readPath(env, 'LEXICON_FILE', 'data/lexicon.json'),
      responses: readPath(env, 'RESPONSES_FILE', 'data/responses.json'),
      embeddingCache: readPath(env, 'EMBEDDING_CACHE_FILE', 'data/cache/embedding-index.json'),
    },
    embedding: {
      provider: readChoice(env, 'EMBEDDING_PROVIDER', ['hashing', 'openai'], 'hashing'),
      openAiApiKey: env['OPENAI_API_KEY'] || '',
      openAiModel: env['OPENAI_EMBED_MODEL'] || 'text-embedding-3-small',
    },
    similarityBackend: readChoice(env, 'SIMILARITY_BACKEND', ['fuzzball', 'indel'], 'fuzzball'),
    thresholds: {
      semantic: readNumber(env, 'SEMANTIC_THRESHOLD', DEFAULT_THRESHOLDS.semantic),
      expertTip: readNumber(env, 'EXPERT_TIP_THRESHOLD', DEFAULT_THRESHOLDS.expertTip),
      seeAlso: readNumber(env, 'SEE_ALSO_THRESHOLD', DEFAULT_THRESHOLDS.seeAlso),
      fuzzy: readNumber(env, 'FUZZY_THRESHOLD', DEFAULT_THRESHOLDS.fuzzy),
      typo: readNumber(env, 'TYPO_THRESHOLD', DEFAULT_THRESHOLDS.typo),
    },
    queryCache: {
      size: readNumber(env, 'QUERY_CACHE_SIZE', 100, true),
      ttlMs: readNumber(env, 'QUERY_CACHE_TTL_MS', 5 * 60 * 1000, true),
    },
  };

  if (config.embedding.provider === 'openai' && !config.embedding.openAiApiKey) {
    console.warn('[appConfig] EMBEDDING_PROVIDER=openai without OPENAI_API_KEY, using hashing');
    config.embedding.provider = 'hashing';
  }

  return Object.freeze(config);
}

let cached: AppConfig | null = null;

/** Process-wide config, read once */
export function getAppConfig(): AppConfig {
  if (!cached) cached = loadAppConfig();
  return cached;
}
