// src/enhancement/embeddingSource.ts
// Enhancement: embedding-backed similarity source for the merger.

import { embedTexts, type EmbedOptions } from '../ai/embeddings';
import { embeddingIndexFrom, type EmbeddingIndex, type EmbeddingVector } from '../merge/similarity';
import type { EnrichmentContext, SimilaritySource } from './types';

export type EmbedFn = (texts: string[], opts?: EmbedOptions) => Promise<number[][]>;

export interface EmbeddingSourceOptions extends EmbedOptions {
  /** Injected embedding call; defaults to the provider client */
  embed?: EmbedFn;
}

export class EmbeddingSimilaritySource implements SimilaritySource {
  readonly name = 'embeddings';
  private readonly embed: EmbedFn;

  constructor(private readonly options: EmbeddingSourceOptions = {}) {
    this.embed = options.embed ?? embedTexts;
  }

  /** Embed each distinct text once; a length mismatch from the provider is an error */
  async buildIndex(texts: string[], ctx: EnrichmentContext): Promise<EmbeddingIndex> {
    const distinct = [...new Set(texts)];
    const vectors = await this.embed(distinct, { provider: this.options.provider, model: this.options.model });
    if (vectors.length !== distinct.length) {
      throw new Error(`Embedding provider returned ${vectors.length} vectors for ${distinct.length} texts`);
    }

    const entries: Array<readonly [string, EmbeddingVector]> = distinct.map((t, i) => [t, vectors[i]] as const);
    ctx.log.debug({ texts: distinct.length }, 'Built embedding index');
    return embeddingIndexFrom(entries);
  }
}
