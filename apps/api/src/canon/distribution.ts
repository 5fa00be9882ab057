import type { CategoryDistribution } from '../types/survey';

type DistributionOptions = {
  // Labels listed first, in this order; anything else follows by first appearance.
  order?: string[];
  // Labels that always go last, in this order (fallback buckets).
  trailing?: string[];
  // Keep zero-count entries for labels named in `order`.
  includeZero?: boolean;
};

/**
 * Counts labels and assigns percentages to one decimal. Rounding uses the
 * largest-remainder method on tenths of a percent, so the entries of a
 * non-empty distribution always sum to exactly 100.0; equal remainders go to
 * the entry listed first.
 */
export const buildDistribution = (labels: string[], options: DistributionOptions = {}): CategoryDistribution => {
  const counts = new Map<string, number>();
  labels.forEach(label => counts.set(label, (counts.get(label) || 0) + 1));

  const trailing = options.trailing || [];
  const ordered: string[] = [];
  const push = (label: string) => {
    if (!ordered.includes(label)) ordered.push(label);
  };

  (options.order || []).forEach(label => {
    if (!trailing.includes(label) && (options.includeZero || counts.has(label))) push(label);
  });
  counts.forEach((_count, label) => {
    if (!trailing.includes(label)) push(label);
  });
  trailing.forEach(label => {
    if (counts.has(label)) push(label);
  });

  const total = labels.length;
  if (!total) return { total: 0, entries: ordered.map(label => ({ label, count: 0, percentage: 0 })) };

  const shares = ordered.map((label, position) => {
    const count = counts.get(label) || 0;
    const exact = (count * 1000) / total;
    const units = Math.floor(exact);
    return { label, count, units, remainder: exact - units, position };
  });

  let missing = 1000 - shares.reduce((acc, share) => acc + share.units, 0);
  const byRemainder = [...shares].sort((a, b) => b.remainder - a.remainder || a.position - b.position);
  for (const share of byRemainder) {
    if (missing <= 0) break;
    if (share.remainder <= 0) continue;
    share.units += 1;
    missing -= 1;
  }

  return {
    total,
    entries: shares.map(share => ({ label: share.label, count: share.count, percentage: share.units / 10 }))
  };
};

export const distributionToRecord = (distribution: CategoryDistribution) =>
  Object.fromEntries(distribution.entries.map(entry => [entry.label, entry.percentage]));
