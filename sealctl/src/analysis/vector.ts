export type Vector = number[];

export function norm(v: Vector): number {
  let s = 0;
  for (const x of v) s += x * x;
  return Math.sqrt(s);
}

/** 1 - cosine similarity. Callers must not pass zero vectors. */
export function cosineDistance(a: Vector, b: Vector): number {
  if (a.length !== b.length) throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  const denom = norm(a) * norm(b);
  if (denom === 0) throw new Error("Cosine distance of a zero vector");
  return 1 - dot / denom;
}

export function centroid(vectors: Vector[]): Vector | null {
  const first = vectors[0];
  if (!first) return null;
  const out = new Array<number>(first.length).fill(0);
  for (const v of vectors) {
    for (let i = 0; i < out.length; i++) out[i] += v[i];
  }
  return out.map((x) => x / vectors.length);
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function max(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => (b > a ? b : a), -Infinity);
}

export function round(value: number, digits = 4): number {
  const f = Math.pow(10, digits);
  return Math.round(value * f) / f;
}
