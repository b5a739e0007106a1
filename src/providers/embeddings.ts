/**
 * NewsRelay — Embedding Provider
 *
 * Turns text into dense vectors for the similarity scorer.
 * The OpenAI SDK talks to any OpenAI-compatible embeddings endpoint,
 * so a self-hosted multilingual model works through EMBEDDING_BASE_URL.
 */

import OpenAI from 'openai';
import { EmbeddingError } from '../lib/errors';
import { logger, timeOperation } from '../lib/logger';

export type Vector = number[];

export interface EmbeddingProvider {
  embed(text: string): Promise<Vector>;
}

export interface OpenAIEmbeddingConfig {
  apiKey?: string;
  model: string;
  baseUrl?: string;
}

// Inputs beyond this are truncated before the request
const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: OpenAI | null = null;
  private readonly log = logger.child({ component: 'embeddings' });

  constructor(private readonly config: OpenAIEmbeddingConfig) {}

  /**
   * Created on first use so startup never depends on the endpoint.
   */
  private getClient(): OpenAI {
    if (this.client) return this.client;

    if (!this.config.apiKey && !this.config.baseUrl) {
      throw new EmbeddingError('OPENAI_API_KEY or EMBEDDING_BASE_URL must be set');
    }

    this.client = new OpenAI({
      apiKey: this.config.apiKey ?? 'unused',
      baseURL: this.config.baseUrl,
    });
    this.log.info('Embedding client initialized', {
      model: this.config.model,
      baseUrl: this.config.baseUrl ?? 'default',
    });
    return this.client;
  }

  async embed(text: string): Promise<Vector> {
    const client = this.getClient();
    const response = await timeOperation(
      'Embedding request',
      () =>
        client.embeddings.create({
          model: this.config.model,
          input: text.substring(0, MAX_INPUT_CHARS),
        }),
      this.log
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingError(`Empty embedding returned by ${this.config.model}`);
    }
    return embedding;
  }
}

// ============================================================
// VECTOR MATH
// ============================================================

export function zeroVector(dimensions: number): Vector {
  return new Array<number>(dimensions).fill(0);
}

/**
 * Cosine similarity with a small epsilon so zero vectors score 0
 * instead of NaN.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB) + 1e-9);
}
