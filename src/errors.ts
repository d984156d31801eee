export type AdvisorErrorCode = 'LOAD_ERROR' | 'NOT_FOUND' | 'INVALID_ARGUMENT' | 'EMPTY_QUERY';

export class AdvisorError extends Error {
  readonly code: AdvisorErrorCode;

  constructor(code: AdvisorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Source data could not be turned into a knowledge base. The previous snapshot, if any, is untouched. */
export class LoadError extends AdvisorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('LOAD_ERROR', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class NotFoundError extends AdvisorError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class InvalidArgumentError extends AdvisorError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** The query normalized to nothing (blank, or only stop words). The caller should ask for more detail. */
export class EmptyQueryError extends AdvisorError {
  constructor(message = 'Query has no meaningful terms after normalization') {
    super('EMPTY_QUERY', message);
  }
}

export function httpStatusFor(err: unknown): number {
  if (!(err instanceof AdvisorError)) return 500;
  switch (err.code) {
    case 'NOT_FOUND': return 404;
    case 'INVALID_ARGUMENT': return 400;
    case 'EMPTY_QUERY': return 422;
    case 'LOAD_ERROR': return 500;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof AdvisorError ? err.code : 'INTERNAL';
}
