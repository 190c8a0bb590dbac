import { describe, it, expect, vi, beforeEach } from 'vitest';
import { provisionWarehouse, provisioningSteps } from '../provision';
import type { RelationalStore } from '../types';
import { testSnowflakeConfig } from './fakes';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('provisioningSteps', () => {
  it('creates warehouse objects in dependency order', () => {
    const steps = provisioningSteps(testSnowflakeConfig);

    expect(steps.map(step => step.name)).toEqual(['warehouse', 'database', 'schema', 'table', 'search service']);
    expect(steps[0].statement).toContain('CREATE WAREHOUSE IF NOT EXISTS WH');
    expect(steps[1].statement).toBe('CREATE DATABASE IF NOT EXISTS DB');
    expect(steps[2].statement).toBe('CREATE SCHEMA IF NOT EXISTS DB.SC');
    expect(steps[3].statement).toContain('CREATE TABLE IF NOT EXISTS DB.SC.VIDEOS');
    expect(steps[4].statement).toContain('CREATE CORTEX SEARCH SERVICE IF NOT EXISTS DB.SC.SVC');
    expect(steps[4].statement).toContain('ATTRIBUTES VIDEO_YEAR');
  });
});

describe('provisionWarehouse', () => {
  it('runs every step', async () => {
    const execute = vi.fn<RelationalStore['execute']>().mockResolvedValue([]);
    const report = await provisionWarehouse({ execute }, testSnowflakeConfig);

    expect(report).toEqual({
      success: true,
      completed: ['warehouse', 'database', 'schema', 'table', 'search service'],
    });
    expect(execute).toHaveBeenCalledTimes(5);
  });

  it('stops at the first failing statement', async () => {
    const execute = vi
      .fn<RelationalStore['execute']>()
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([])
      .mockRejectedValueOnce(new Error('insufficient privileges'));
    const report = await provisionWarehouse({ execute }, testSnowflakeConfig);

    expect(report).toEqual({
      success: false,
      completed: ['warehouse', 'database'],
      failedStep: 'schema',
      error: 'insufficient privileges',
    });
    expect(execute).toHaveBeenCalledTimes(3);
  });
});
