import type { SnowflakeConfig } from '../config';
import type { ResultRow, SearchRequest, SearchResponse, SemanticSearchIndex } from '../types';

export const testSnowflakeConfig: SnowflakeConfig = {
  account: 'test-account',
  token: 'test-token',
  warehouse: 'WH',
  database: 'DB',
  schema: 'SC',
  table: 'VIDEOS',
  searchService: 'SVC',
  statementTimeout: 5,
};

// Titles Talk 1..n, years cycling 2010..2019
export function makeRows(count: number): ResultRow[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Talk ${i + 1}`,
    description: `Description ${i + 1}`,
    thumbnailUrl: `https://example.com/thumbs/${i + 1}.jpg`,
    year: 2010 + (i % 10),
  }));
}

// Honours the year filter, offset and limit like the managed index
export class FakeIndex implements SemanticSearchIndex {
  requests: SearchRequest[] = [];
  failWith?: Error;

  constructor(private readonly rows: ResultRow[]) {}

  async search(request: SearchRequest): Promise<SearchResponse> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }

    let min = -Infinity;
    let max = Infinity;
    for (const predicate of request.filter?.['@and'] ?? []) {
      if ('@gte' in predicate) min = predicate['@gte'].VIDEO_YEAR;
      else max = predicate['@lte'].VIDEO_YEAR;
    }
    const matching = this.rows.filter(row => row.year >= min && row.year <= max);
    return {
      results: matching.slice(request.offset, request.offset + request.limit),
      totalCount: matching.length,
    };
  }
}
