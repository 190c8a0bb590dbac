import { PAGE_SIZE, totalPages } from './session';
import type { ResultRow, SessionState, YearRange } from './types';

export const DESCRIPTION_PREVIEW_CHARS = 300;

export interface SessionView {
  query: string | null;
  yearRange: YearRange | null;
  page: number | null;
  totalPages: number;
  totalCount: number;
  rangeLabel: string | null;
  rows: ResultRow[];
  // Only shown on page 1
  summary: string | null;
}

export function truncateDescription(description: string, max: number = DESCRIPTION_PREVIEW_CHARS): string {
  return description.length > max ? `${description.slice(0, max)}...` : description;
}

export function rangeLabel(page: number, totalCount: number, pageSize: number = PAGE_SIZE): string {
  const first = (page - 1) * pageSize + 1;
  const last = Math.min(page * pageSize, totalCount);
  return `Showing results ${first} to ${last} of ${totalCount} videos`;
}

export function toSessionView(state: SessionState, pageSize: number = PAGE_SIZE): SessionView {
  const { currentQuery, currentPage } = state;
  const totalCount = currentPage?.totalCount ?? 0;
  const page = currentPage?.query.page ?? null;

  return {
    query: currentQuery?.text ?? null,
    yearRange: currentQuery?.yearRange ?? null,
    page,
    totalPages: totalPages(totalCount, pageSize),
    totalCount,
    rangeLabel: currentPage && page !== null ? rangeLabel(page, totalCount, pageSize) : null,
    rows: (currentPage?.rows ?? []).map(row => ({
      ...row,
      description: truncateDescription(row.description),
    })),
    summary: page === 1 ? state.summary ?? null : null,
  };
}
