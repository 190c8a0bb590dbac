export interface YearRange {
  minYear: number;
  maxYear: number;
}

export interface SearchQuery {
  readonly text: string;
  readonly page: number;
  readonly yearRange?: YearRange;
}

export interface ResultRow {
  title: string;
  description: string;
  thumbnailUrl: string;
  year: number;
}

export interface ResultPage {
  readonly query: SearchQuery;
  readonly rows: readonly ResultRow[];
  readonly totalCount: number;
}

export interface SessionState {
  readonly currentQuery?: SearchQuery;
  readonly currentPage?: ResultPage;
  readonly summary?: string;
  // Fingerprint of the rows `summary` was generated from
  readonly summaryFor?: string;
}

export type NoticeCode =
  | 'COLLABORATOR_UNAVAILABLE'
  | 'EMPTY_QUERY'
  | 'NO_RESULTS'
  | 'SUMMARIZATION_FAILED'
  | 'PAGE_OUT_OF_RANGE'
  | 'INVALID_YEAR_RANGE';

export interface SessionNotice {
  code: NoticeCode;
  level: 'error' | 'warning';
  message: string;
}

export interface ActionOutcome {
  state: SessionState;
  notices: SessionNotice[];
}

// One row of the warehouse table, in its column layout
export interface VideoRecord {
  VIDEO_TITLE: string;
  THUMBNAIL: string;
  VIDEO_DESCRIPTION: string;
  VIDEO_YEAR: number;
}

export type BindValue = string | number | boolean | null;

export type StoreRow = Record<string, string | null>;

export interface RelationalStore {
  execute(statement: string, binds?: BindValue[]): Promise<StoreRow[]>;
}

export type YearPredicate =
  | { '@gte': Record<string, number> }
  | { '@lte': Record<string, number> };

export interface SearchFilter {
  '@and': YearPredicate[];
}

export interface SearchRequest {
  query: string;
  columns: string[];
  limit: number;
  offset: number;
  filter?: SearchFilter;
}

export interface SearchResponse {
  results: ResultRow[];
  // Rows in the table that match the active filter
  totalCount: number;
}

export interface SemanticSearchIndex {
  search(request: SearchRequest): Promise<SearchResponse>;
}

export interface TextCompletionService {
  complete(model: string, prompt: string): Promise<string>;
}

export interface UploadRecord {
  upload_id: number;
  source: string;
  rows_loaded: number;
  rows_skipped: number;
  uploaded_at: string;
}

export interface CachedSummary {
  cache_key: string;
  model: string;
  summary: string;
  created_at: string;
}
