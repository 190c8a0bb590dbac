import {
  EmptyQueryError,
  InvalidYearRangeError,
  NoResultsError,
  PageOutOfRangeError,
  SearchSessionError,
  SummarizationFailedError,
  errorMessage,
  toCollaboratorError,
} from './errors';
import { SEARCH_COLUMNS, buildYearFilter } from './search';
import type {
  ActionOutcome,
  ResultPage,
  ResultRow,
  SearchQuery,
  SemanticSearchIndex,
  SessionState,
  TextCompletionService,
  YearRange,
} from './types';

export const PAGE_SIZE = 50;
export const SUMMARY_ROW_COUNT = 3;

export interface ControllerDeps {
  index: SemanticSearchIndex;
  completion: TextCompletionService;
  model: string;
  pageSize?: number;
}

export function createSessionState(): SessionState {
  return {};
}

export function totalPages(totalCount: number, pageSize: number = PAGE_SIZE): number {
  return Math.ceil(totalCount / pageSize);
}

export function buildSummaryPrompt(rows: readonly ResultRow[]): string {
  const videos = rows.map(
    (row, i) => `Video ${i + 1}:\nTitle: ${row.title}\nDescription: ${row.description}`,
  );
  return `Here are the top ${rows.length} videos from a search. Please provide a coherent summary that connects these videos and their main themes in 3-4 sentences:\n\n${videos.join('\n')}`;
}

export function summaryFingerprint(rows: readonly ResultRow[]): string {
  return JSON.stringify(rows.map(row => [row.title, row.description]));
}

function rejected(state: SessionState, error: SearchSessionError): ActionOutcome {
  return { state, notices: [error.toNotice()] };
}

export class QuerySessionController {
  private readonly pageSize: number;

  constructor(private readonly deps: ControllerDeps) {
    this.pageSize = deps.pageSize ?? PAGE_SIZE;
  }

  async submitSearch(state: SessionState, text: string, yearRange?: YearRange): Promise<ActionOutcome> {
    const trimmed = text.trim();
    if (trimmed === '') {
      return rejected(state, new EmptyQueryError());
    }
    if (yearRange && yearRange.minYear > yearRange.maxYear) {
      return rejected(state, new InvalidYearRangeError(yearRange.minYear, yearRange.maxYear));
    }

    const query: SearchQuery = { text: trimmed, page: 1, yearRange };
    let page: ResultPage;
    try {
      page = await this.fetchPage(query);
    } catch (error) {
      return {
        state: { currentQuery: query },
        notices: [toCollaboratorError(error, 'search').toNotice()],
      };
    }

    if (page.rows.length === 0) {
      return {
        state: { currentQuery: query },
        notices: [new NoResultsError(trimmed).toNotice()],
      };
    }

    return this.summarizeTop({ currentQuery: query, currentPage: page }, page.rows.slice(0, SUMMARY_ROW_COUNT));
  }

  async goToPage(state: SessionState, pageNumber: number): Promise<ActionOutcome> {
    const { currentQuery, currentPage } = state;
    const lastPage = currentPage ? totalPages(currentPage.totalCount, this.pageSize) : 0;
    if (!currentQuery || !currentPage || !Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > lastPage) {
      return rejected(state, new PageOutOfRangeError(pageNumber, lastPage));
    }

    const query: SearchQuery = { ...currentQuery, page: pageNumber };
    let page: ResultPage;
    try {
      page = await this.fetchPage(query);
    } catch (error) {
      // The last good page stays on screen
      return rejected(state, toCollaboratorError(error, 'search'));
    }

    const next: SessionState = { ...state, currentQuery: query, currentPage: page };
    const top = page.rows.slice(0, SUMMARY_ROW_COUNT);
    if (pageNumber === 1 && top.length > 0 && state.summaryFor !== summaryFingerprint(top)) {
      return this.summarizeTop(next, top);
    }
    return { state: next, notices: [] };
  }

  async summarizeTop(state: SessionState, topRows: readonly ResultRow[]): Promise<ActionOutcome> {
    const rows = topRows.slice(0, SUMMARY_ROW_COUNT);
    if (rows.length === 0) {
      return { state, notices: [] };
    }

    const withoutSummary: SessionState = { ...state, summary: undefined, summaryFor: undefined };
    let summary: string;
    try {
      summary = (await this.deps.completion.complete(this.deps.model, buildSummaryPrompt(rows))).trim();
    } catch (error) {
      const failure = new SummarizationFailedError(
        `Could not summarize the top results: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
      return rejected(withoutSummary, failure);
    }

    if (summary === '') {
      return rejected(withoutSummary, new SummarizationFailedError('The summary came back empty.'));
    }
    return {
      state: { ...state, summary, summaryFor: summaryFingerprint(rows) },
      notices: [],
    };
  }

  private async fetchPage(query: SearchQuery): Promise<ResultPage> {
    const response = await this.deps.index.search({
      query: query.text,
      columns: SEARCH_COLUMNS,
      limit: this.pageSize,
      offset: (query.page - 1) * this.pageSize,
      filter: buildYearFilter(query.yearRange),
    });
    return { query, rows: response.results, totalCount: response.totalCount };
  }
}
