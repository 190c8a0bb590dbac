import type { NoticeCode, SessionNotice } from './types';

export type Collaborator = 'store' | 'search' | 'completion';

export class SearchSessionError extends Error {
  constructor(
    message: string,
    public code: NoticeCode,
    public level: 'error' | 'warning' = 'error',
  ) {
    super(message);
    this.name = 'SearchSessionError';
  }

  toNotice(): SessionNotice {
    return { code: this.code, level: this.level, message: this.message };
  }
}

export class CollaboratorUnavailableError extends SearchSessionError {
  constructor(
    message: string,
    public collaborator: Collaborator,
    public statusCode?: number,
    public originalError?: Error,
  ) {
    super(message, 'COLLABORATOR_UNAVAILABLE');
    this.name = 'CollaboratorUnavailableError';
  }
}

export class EmptyQueryError extends SearchSessionError {
  constructor() {
    super('Enter a search query first.', 'EMPTY_QUERY', 'warning');
    this.name = 'EmptyQueryError';
  }
}

export class NoResultsError extends SearchSessionError {
  constructor(query: string) {
    super(`No results found for "${query}".`, 'NO_RESULTS', 'warning');
    this.name = 'NoResultsError';
  }
}

export class SummarizationFailedError extends SearchSessionError {
  constructor(
    message: string,
    public originalError?: Error,
  ) {
    super(message, 'SUMMARIZATION_FAILED', 'warning');
    this.name = 'SummarizationFailedError';
  }
}

export class PageOutOfRangeError extends SearchSessionError {
  constructor(
    public page: number,
    public totalPages: number,
  ) {
    super(
      totalPages === 0
        ? 'There are no results to page through.'
        : `Page ${page} is outside 1-${totalPages}.`,
      'PAGE_OUT_OF_RANGE',
      'warning',
    );
    this.name = 'PageOutOfRangeError';
  }
}

export class InvalidYearRangeError extends SearchSessionError {
  constructor(minYear: number, maxYear: number) {
    super(
      `Year range ${minYear}-${maxYear} is invalid: the start year must not be after the end year.`,
      'INVALID_YEAR_RANGE',
      'warning',
    );
    this.name = 'InvalidYearRangeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Anything a collaborator call throws becomes CollaboratorUnavailableError
export function toCollaboratorError(
  error: unknown,
  collaborator: Collaborator,
): CollaboratorUnavailableError {
  if (error instanceof CollaboratorUnavailableError) {
    return error;
  }
  return new CollaboratorUnavailableError(
    `${collaborator} service unavailable: ${errorMessage(error)}`,
    collaborator,
    undefined,
    error instanceof Error ? error : undefined,
  );
}
