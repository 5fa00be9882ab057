export type AnalysisErrorKind = 'EmptyInput' | 'UnreadableSource' | 'InvalidRuleSet';

export class AnalysisError extends Error {
  readonly kind: AnalysisErrorKind;
  readonly status: number;

  constructor(kind: AnalysisErrorKind, message: string, status = 400) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.status = status;
  }
}

export class EmptyInputError extends AnalysisError {
  constructor(message = 'Uploaded table has no data rows.') {
    super('EmptyInput', message);
  }
}

export class UnreadableSourceError extends AnalysisError {
  constructor(message: string) {
    super('UnreadableSource', message);
  }
}

export class InvalidRuleSetError extends AnalysisError {
  constructor(message: string) {
    super('InvalidRuleSet', message, 500);
  }
}

export const errorMessage = (err: unknown, fallback: string) =>
  err instanceof Error && err.message ? err.message : fallback;
