import fs from "node:fs";
import { bundledFile } from "../core/paths.js";

let stopwords: Set<string> | null = null;

export function loadStopwords(): Set<string> {
  if (stopwords) return stopwords;
  const raw = fs.readFileSync(bundledFile("stopwords.txt"), "utf8");
  stopwords = new Set(
    raw
      .split("\n")
      .map((l) => l.trim().toLowerCase())
      .filter((l) => l.length > 0 && !l.startsWith("#")),
  );
  return stopwords;
}

/** Lowercased word tokens with code fences, URLs and non-letters removed. */
export function tokenize(text: string): string[] {
  const cleaned = text
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/https?:\/\/\S+/g, " ")
    .replace(/[^a-zA-Z\s]/g, " ")
    .toLowerCase();
  return cleaned.split(/\s+/).filter((w) => w.length > 0);
}

/** Concept terms: tokens longer than three letters that are not stopwords. */
export function extractKeywords(text: string): Set<string> {
  const stop = loadStopwords();
  return new Set(tokenize(text).filter((w) => w.length > 3 && !stop.has(w)));
}

export function jaccardDistance(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const x of a) if (b.has(x)) shared++;
  return 1 - shared / (a.size + b.size - shared);
}
