/**
 * Makes proposed column names unique, left to right. The first occurrence keeps its
 * name; later duplicates get `name_2`, `name_3`, ... skipping any name already taken.
 */
export const resolveCollisions = (names: string[]): string[] => {
  const used = new Set<string>();
  return names.map(name => {
    let candidate = name;
    for (let n = 2; used.has(candidate); n++) {
      candidate = `${name}_${n}`;
    }
    used.add(candidate);
    return candidate;
  });
};

// Backstop after resolution: keeps the first column carrying each final name.
export const dedupeColumns = <T extends { name: string }>(columns: T[]): T[] => {
  const seen = new Set<string>();
  return columns.filter(column => {
    if (seen.has(column.name)) return false;
    seen.add(column.name);
    return true;
  });
};
