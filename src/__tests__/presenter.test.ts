import { describe, it, expect } from 'vitest';
import { rangeLabel, toSessionView, truncateDescription } from '../presenter';
import type { SessionState } from '../types';
import { makeRows } from './fakes';

describe('truncateDescription', () => {
  it('cuts long descriptions to 300 characters', () => {
    expect(truncateDescription('x'.repeat(301))).toBe(`${'x'.repeat(300)}...`);
    expect(truncateDescription('x'.repeat(300))).toBe('x'.repeat(300));
  });
});

describe('rangeLabel', () => {
  it('describes the rows on a page', () => {
    expect(rangeLabel(1, 120)).toBe('Showing results 1 to 50 of 120 videos');
    expect(rangeLabel(3, 120)).toBe('Showing results 101 to 120 of 120 videos');
    expect(rangeLabel(1, 7, 3)).toBe('Showing results 1 to 3 of 7 videos');
  });
});

describe('toSessionView', () => {
  it('renders an empty session', () => {
    expect(toSessionView({})).toEqual({
      query: null,
      yearRange: null,
      page: null,
      totalPages: 0,
      totalCount: 0,
      rangeLabel: null,
      rows: [],
      summary: null,
    });
  });

  it('shows the summary on page 1 only', () => {
    const query = { text: 'bees', page: 1, yearRange: { minYear: 2010, maxYear: 2019 } };
    const page1: SessionState = {
      currentQuery: query,
      currentPage: { query, rows: makeRows(2), totalCount: 60 },
      summary: 'About bees.',
    };
    const page2Query = { ...query, page: 2 };
    const page2: SessionState = {
      ...page1,
      currentQuery: page2Query,
      currentPage: { query: page2Query, rows: makeRows(1), totalCount: 60 },
    };

    expect(toSessionView(page1)).toMatchObject({
      query: 'bees',
      yearRange: { minYear: 2010, maxYear: 2019 },
      page: 1,
      totalPages: 2,
      totalCount: 60,
      rangeLabel: 'Showing results 1 to 50 of 60 videos',
      summary: 'About bees.',
    });
    expect(toSessionView(page2)).toMatchObject({
      page: 2,
      rangeLabel: 'Showing results 51 to 60 of 60 videos',
      summary: null,
    });
  });

  it('truncates row descriptions without touching the state', () => {
    const rows = [{ ...makeRows(1)[0], description: 'd'.repeat(400) }];
    const query = { text: 'bees', page: 1 };
    const state: SessionState = { currentQuery: query, currentPage: { query, rows, totalCount: 1 } };

    expect(toSessionView(state).rows[0].description).toBe(`${'d'.repeat(300)}...`);
    expect(state.currentPage?.rows[0].description).toHaveLength(400);
  });
});
