import type { Diagnostic } from '../types/survey';
import { closestNames } from '../utils/similarity';

export const missingField = (feature: string, field: string, availableFields: string[]): Diagnostic => {
  const suggestions = closestNames(field, availableFields);
  const hint = suggestions.length ? ` Did you mean: ${suggestions.join(', ')}?` : '';
  return {
    kind: 'MissingRequiredField',
    feature,
    field,
    availableFields,
    suggestions,
    message:
      `Skipped "${feature}": required field "${field}" was not found. ` +
      `Available fields: ${availableFields.join(', ') || '(none)'}.${hint}`
  };
};

export const unclassifiable = (
  kind: 'UnclassifiableValue' | 'UnclassifiableText',
  field: string,
  count: number,
  samples: string[],
  bucket: string
): Diagnostic => ({
  kind,
  field,
  count,
  samples: samples.slice(0, 5),
  message: `${count} value(s) in "${field}" matched no rule and were counted as "${bucket}".`
});
