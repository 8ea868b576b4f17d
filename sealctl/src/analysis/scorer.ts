import { extractKeywords, tokenize } from "./text.js";
import type { Vector } from "./vector.js";

/**
 * Embedding / language-model collaborator. Implementations may call a remote
 * service; each call covers a single item so one failure skips one item.
 */
export interface SemanticScorer {
  readonly id: string;
  embed(text: string): Promise<Vector>;
  /** Mean surprisal of `text`, in bits per token, under a model fit to `baseline`. */
  surprisal(text: string, baseline: readonly string[]): Promise<number>;
}

type UnigramModel = { counts: Map<string, number>; total: number };

/** FNV-1a, 32 bit. */
function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Offline scorer: hashed bag-of-keywords embeddings and an add-one smoothed
 * unigram model. Deterministic, so analysis runs can be reproduced.
 */
export class LocalScorer implements SemanticScorer {
  readonly id: string;
  private readonly models = new WeakMap<readonly string[], UnigramModel>();

  constructor(private readonly dimensions = 256) {
    this.id = `local-bow-${dimensions}`;
  }

  async embed(text: string): Promise<Vector> {
    const v = new Array<number>(this.dimensions).fill(0);
    for (const word of extractKeywords(text)) {
      v[fnv1a(word) % this.dimensions] += 1;
    }
    return v;
  }

  async surprisal(text: string, baseline: readonly string[]): Promise<number> {
    const tokens = tokenize(text);
    if (tokens.length === 0) return 0;

    const model = this.model(baseline);
    // +1 vocabulary slot for unseen tokens
    const vocab = model.counts.size + 1;
    let bits = 0;
    for (const t of tokens) {
      const p = ((model.counts.get(t) ?? 0) + 1) / (model.total + vocab);
      bits -= Math.log2(p);
    }
    return bits / tokens.length;
  }

  private model(baseline: readonly string[]): UnigramModel {
    const cached = this.models.get(baseline);
    if (cached) return cached;
    const counts = new Map<string, number>();
    let total = 0;
    for (const doc of baseline) {
      for (const t of tokenize(doc)) {
        counts.set(t, (counts.get(t) ?? 0) + 1);
        total++;
      }
    }
    const model = { counts, total };
    this.models.set(baseline, model);
    return model;
  }
}
