import levenshtein from 'fast-levenshtein';
import { normalizeHeader } from '../canon/headers';

export const nameSimilarity = (a: string, b: string) => {
  const na = normalizeHeader(a);
  const nb = normalizeHeader(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};

// Closest available names first; only those at or above `threshold`.
export const closestNames = (target: string, candidates: string[], threshold = 0.5, limit = 3) =>
  candidates
    .map((name, index) => ({ name, index, score: nameSimilarity(target, name) }))
    .filter(c => c.score >= threshold)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, limit)
    .map(c => c.name);
