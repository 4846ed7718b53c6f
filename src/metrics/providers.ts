/**
 * External scorers that augment the lexical metrics. Every provider is
 * optional: without one, the metrics it backs are null.
 */

export interface EmbeddingProvider {
  /** One vector per input text, in input order. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

export interface TranslationQualityInput {
  source: string;
  hypothesis: string;
  reference: string;
}

/**
 * Learned translation-quality scorer (a COMET-style model served elsewhere).
 */
export interface TranslationQualityProvider {
  score(input: TranslationQualityInput): Promise<number>;
}

export interface OpenAIEmbeddingProviderOptions {
  model?: string;
  /** Defaults to the client's own environment lookup. */
  apiKey?: string;
}

/**
 * Embeddings from the OpenAI API. The `openai` package is loaded on first use.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly apiKey: string | undefined;
  private client: InstanceType<typeof import('openai').default> | null = null;

  constructor(opts?: OpenAIEmbeddingProviderOptions) {
    this.model = opts?.model ?? 'text-embedding-3-small';
    this.apiKey = opts?.apiKey;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const client = await this.getClient();
    const response = await client.embeddings.create({ model: this.model, input: [...texts] });
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }

  private async getClient(): Promise<InstanceType<typeof import('openai').default>> {
    if (this.client) {
      return this.client;
    }
    // Dynamic import: openai is an optional dependency
    let OpenAI: typeof import('openai').default;
    try {
      const mod = await import('openai');
      OpenAI = mod.default;
    } catch {
      throw new Error(
        'The `openai` package is required for OpenAIEmbeddingProvider. Install it with: npm install openai',
      );
    }
    this.client = this.apiKey === undefined ? new OpenAI() : new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }
}

/**
 * Cosine of the angle between two vectors; 0 when either has zero norm.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
  }
  for (const x of a) normA += x * x;
  for (const y of b) normB += y * y;
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
