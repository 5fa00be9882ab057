const cache = new Map<string, RegExp>();

// Compiled patterns are immutable, so one instance per source is shared by every caller.
export const toPattern = (source: string): RegExp => {
  let compiled = cache.get(source);
  if (!compiled) {
    compiled = new RegExp(source, 'i');
    cache.set(source, compiled);
  }
  return compiled;
};

export const isValidPattern = (source: string) => {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
};

export const escapePattern = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
