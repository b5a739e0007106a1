/**
 * NewsRelay — Configuration
 *
 * Environment-driven settings validated with zod.
 * Empty values count as unset so a copied .env.example falls back to defaults.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

// ============================================================
// SCHEMA
// ============================================================

const blankAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const flag = (fallback: boolean) =>
  z.preprocess(
    blankAsUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .optional()
      .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'))
  );

const number = (fallback: number, schema: z.ZodNumber = z.number()) =>
  z.preprocess(blankAsUndefined, z.coerce.number().pipe(schema).default(fallback));

const csv = (fallback: string[]) =>
  z.preprocess(
    blankAsUndefined,
    z
      .string()
      .optional()
      .transform((v) =>
        v === undefined
          ? fallback
          : v
              .split(',')
              .map((s) => s.trim())
              .filter((s) => s.length > 0)
      )
  );

const EnvSchema = z.object({
  // Matching
  SIMILARITY_THRESHOLD: number(0.79, z.number().min(0).max(1)),
  MAX_NEWS_AGE_DAYS: number(2, z.number().int().min(0)),
  MAX_CACHE_SIZE: number(1000, z.number().int().positive()),
  CACHE_MAX_AGE_DAYS: number(3, z.number().min(0)),
  MAX_ANALYZED_URLS: number(5000, z.number().int().positive()),
  MIN_COMMON_WORDS: number(3, z.number().int().positive()),
  HIGH_SIMILARITY_CUTOFF: number(0.7, z.number().min(0).max(1)),
  HIGH_SIMILARITY_BONUS: number(0.1, z.number().min(0)),
  COMMON_WORDS_BONUS: number(0.15, z.number().min(0)),
  KEYWORD_PHRASE_BONUS: number(0.15, z.number().min(0)),
  KEYWORDS_FILE: optionalString,

  // Sources
  PORTAL_URLS: csv([
    'https://www.mos.ru/search/newsfeed?hostApplied=false&no_spellcheck=0&page=1&q=&spheres=18299',
    'https://www.mos.ru/dzdrav/news/',
  ]),
  AGGREGATOR_URL: z.preprocess(blankAsUndefined, z.string().url().default('https://dzen.ru/topic/19711')),
  PORTAL_LABEL: z.preprocess(blankAsUndefined, z.string().default('mos.ru')),
  AGGREGATOR_LABEL: z.preprocess(blankAsUndefined, z.string().default('Дзен')),

  // Embeddings
  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.preprocess(blankAsUndefined, z.string().default('text-embedding-3-small')),
  EMBEDDING_BASE_URL: optionalString,

  // Delivery
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,

  // State
  STATE_BACKEND: z.preprocess(blankAsUndefined, z.enum(['file', 'supabase']).default('file')),
  STATE_DIR: z.preprocess(blankAsUndefined, z.string().default('storage')),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_BUCKET: z.preprocess(blankAsUndefined, z.string().default('newsrelay-state')),
  CACHE_SNAPSHOT: flag(true),

  // Scheduling and control
  TIMEZONE: z.preprocess(blankAsUndefined, z.string().default('Europe/Moscow')),
  CONTROL_PORT: number(3001, z.number().int().positive()),
  CONTROL_TOKEN: optionalString,
});

type Env = z.infer<typeof EnvSchema>;

// ============================================================
// TYPES
// ============================================================

export interface ScorerSettings {
  minCommonWords: number;
  highSimilarityCutoff: number;
  highSimilarityBonus: number;
  commonWordsBonus: number;
  keywordPhraseBonus: number;
}

export interface AppConfig {
  matching: {
    similarityThreshold: number;
    maxNewsAgeDays: number;
    keywordsFile?: string;
    scorer: ScorerSettings;
  };
  cache: {
    maxSize: number;
    maxAgeDays: number;
    snapshot: boolean;
  };
  sources: {
    portalUrls: string[];
    aggregatorUrl: string;
    portalLabel: string;
    aggregatorLabel: string;
  };
  embeddings: {
    apiKey?: string;
    model: string;
    baseUrl?: string;
  };
  telegram: {
    botToken?: string;
    chatId?: string;
  };
  state: {
    backend: 'file' | 'supabase';
    dir: string;
    maxAnalyzedUrls: number;
    supabaseUrl?: string;
    supabaseKey?: string;
    bucket: string;
  };
  scheduler: {
    timezone: string;
  };
  control: {
    port: number;
    token?: string;
  };
}

// ============================================================
// LOADING
// ============================================================

function toAppConfig(env: Env): AppConfig {
  return {
    matching: {
      similarityThreshold: env.SIMILARITY_THRESHOLD,
      maxNewsAgeDays: env.MAX_NEWS_AGE_DAYS,
      keywordsFile: env.KEYWORDS_FILE,
      scorer: {
        minCommonWords: env.MIN_COMMON_WORDS,
        highSimilarityCutoff: env.HIGH_SIMILARITY_CUTOFF,
        highSimilarityBonus: env.HIGH_SIMILARITY_BONUS,
        commonWordsBonus: env.COMMON_WORDS_BONUS,
        keywordPhraseBonus: env.KEYWORD_PHRASE_BONUS,
      },
    },
    cache: {
      maxSize: env.MAX_CACHE_SIZE,
      maxAgeDays: env.CACHE_MAX_AGE_DAYS,
      snapshot: env.CACHE_SNAPSHOT,
    },
    sources: {
      portalUrls: env.PORTAL_URLS,
      aggregatorUrl: env.AGGREGATOR_URL,
      portalLabel: env.PORTAL_LABEL,
      aggregatorLabel: env.AGGREGATOR_LABEL,
    },
    embeddings: {
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      baseUrl: env.EMBEDDING_BASE_URL,
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
    },
    state: {
      backend: env.STATE_BACKEND,
      dir: env.STATE_DIR,
      maxAnalyzedUrls: env.MAX_ANALYZED_URLS,
      supabaseUrl: env.SUPABASE_URL,
      supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY,
      bucket: env.SUPABASE_BUCKET,
    },
    scheduler: {
      timezone: env.TIMEZONE,
    },
    control: {
      port: env.CONTROL_PORT,
      token: env.CONTROL_TOKEN,
    },
  };
}

/**
 * Parse configuration from an environment map.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return toAppConfig(parsed.data);
}
