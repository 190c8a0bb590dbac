import type { SnowflakeConfig } from './config';
import { CollaboratorUnavailableError, toCollaboratorError } from './errors';
import { snowflakeBaseUrl, snowflakeHeaders, type FetchLike } from './snowflake';
import type {
  BindValue,
  RelationalStore,
  ResultRow,
  SearchFilter,
  SearchRequest,
  SearchResponse,
  SemanticSearchIndex,
  StoreRow,
  YearRange,
} from './types';

export const YEAR_COLUMN = 'VIDEO_YEAR';
export const SEARCH_COLUMNS = ['VIDEO_TITLE', 'VIDEO_DESCRIPTION', 'THUMBNAIL', YEAR_COLUMN];

// Cortex Search returns at most this many rows per query
export const MAX_SEARCH_LIMIT = 1000;

export function buildYearFilter(yearRange?: YearRange): SearchFilter | undefined {
  if (!yearRange) return undefined;
  return {
    '@and': [
      { '@gte': { [YEAR_COLUMN]: yearRange.minYear } },
      { '@lte': { [YEAR_COLUMN]: yearRange.maxYear } },
    ],
  };
}

// The same predicate as `filter`, as a SQL WHERE clause over the table
export function filterToSql(filter?: SearchFilter): { where: string; binds: BindValue[] } {
  if (!filter || filter['@and'].length === 0) {
    return { where: '', binds: [] };
  }
  const clauses: string[] = [];
  const binds: BindValue[] = [];
  for (const predicate of filter['@and']) {
    if ('@gte' in predicate) {
      for (const [column, value] of Object.entries(predicate['@gte'])) {
        clauses.push(`${column} >= ?`);
        binds.push(value);
      }
    } else {
      for (const [column, value] of Object.entries(predicate['@lte'])) {
        clauses.push(`${column} <= ?`);
        binds.push(value);
      }
    }
  }
  return { where: ` WHERE ${clauses.join(' AND ')}`, binds };
}

export function parseYear(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string') {
    // Integer years and DATE values ("2016-04-01") both start with the year
    const match = /^\s*(-?\d{1,4})/.exec(value);
    if (match) return parseInt(match[1], 10);
  }
  return 0;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : value == null ? '' : String(value);
}

export function toResultRow(raw: Record<string, unknown>): ResultRow {
  return {
    title: text(raw.VIDEO_TITLE),
    description: text(raw.VIDEO_DESCRIPTION),
    thumbnailUrl: text(raw.THUMBNAIL),
    year: parseYear(raw[YEAR_COLUMN]),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// No offset on the query endpoint: read offset + limit rows and slice
export class CortexSearchIndex implements SemanticSearchIndex {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: SnowflakeConfig,
    private readonly store: RelationalStore,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  get queryUrl(): string {
    const { database, schema, searchService } = this.config;
    return (
      `${snowflakeBaseUrl(this.config.account)}/api/v2/databases/${database}` +
      `/schemas/${schema}/cortex-search-services/${searchService}:query`
    );
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const window = request.offset + request.limit;
    if (window > MAX_SEARCH_LIMIT) {
      throw new CollaboratorUnavailableError(
        `Cortex Search cannot page past result ${MAX_SEARCH_LIMIT}`,
        'search',
      );
    }

    const [results, totalCount] = await Promise.all([
      this.query(request, window),
      this.countMatches(request.filter),
    ]);

    return {
      results: results.slice(request.offset, window),
      // Rows past the service limit can never be fetched
      totalCount: Math.min(totalCount, MAX_SEARCH_LIMIT),
    };
  }

  async countMatches(filter?: SearchFilter): Promise<number> {
    const { where, binds } = filterToSql(filter);
    let rows: StoreRow[];
    try {
      rows = await this.store.execute(`SELECT COUNT(*) AS TOTAL FROM ${this.config.table}${where}`, binds);
    } catch (error) {
      throw toCollaboratorError(error, 'store');
    }
    const total = Number(rows[0]?.TOTAL ?? 0);
    return Number.isFinite(total) ? total : 0;
  }

  private async query(request: SearchRequest, limit: number): Promise<ResultRow[]> {
    const body: Record<string, unknown> = {
      query: request.query,
      columns: request.columns,
      limit,
    };
    if (request.filter) {
      body.filter = request.filter;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.queryUrl, {
        method: 'POST',
        headers: snowflakeHeaders(this.config.token),
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw toCollaboratorError(error, 'search');
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new CollaboratorUnavailableError(
        `Cortex Search error (${response.status}): ${errorText}`,
        'search',
        response.status,
      );
    }

    const data: unknown = await response.json();
    if (!isRecord(data) || !Array.isArray(data.results)) {
      throw new CollaboratorUnavailableError('Cortex Search returned no results array', 'search', response.status);
    }
    return data.results.filter(isRecord).map(toResultRow);
  }
}
