import type { SnowflakeConfig } from './config';
import { errorMessage } from './errors';
import type { RelationalStore } from './types';

export interface ProvisionStep {
  name: string;
  statement: string;
}

export interface ProvisionReport {
  success: boolean;
  completed: string[];
  failedStep?: string;
  error?: string;
}

export function provisioningSteps(config: SnowflakeConfig): ProvisionStep[] {
  const { warehouse, database, schema, table, searchService } = config;
  const qualifiedSchema = `${database}.${schema}`;
  const qualifiedTable = `${qualifiedSchema}.${table}`;

  return [
    {
      name: 'warehouse',
      statement: `CREATE WAREHOUSE IF NOT EXISTS ${warehouse}
        WITH WAREHOUSE_SIZE = 'XSMALL'
        AUTO_SUSPEND = 60
        AUTO_RESUME = TRUE`,
    },
    {
      name: 'database',
      statement: `CREATE DATABASE IF NOT EXISTS ${database}`,
    },
    {
      name: 'schema',
      statement: `CREATE SCHEMA IF NOT EXISTS ${qualifiedSchema}`,
    },
    {
      name: 'table',
      statement: `CREATE TABLE IF NOT EXISTS ${qualifiedTable} (
        VIDEO_TITLE VARCHAR(1000),
        THUMBNAIL VARCHAR(1000),
        VIDEO_DESCRIPTION VARCHAR(4000),
        VIDEO_YEAR INTEGER
      )`,
    },
    {
      name: 'search service',
      statement: `CREATE CORTEX SEARCH SERVICE IF NOT EXISTS ${qualifiedSchema}.${searchService}
        ON VIDEO_DESCRIPTION
        ATTRIBUTES VIDEO_YEAR
        WAREHOUSE = ${warehouse}
        TARGET_LAG = '1 hour'
        AS (
          SELECT VIDEO_TITLE, THUMBNAIL, VIDEO_DESCRIPTION, VIDEO_YEAR
          FROM ${qualifiedTable}
        )`,
    },
  ];
}

// Stops at the first failure. `store` must send no database/schema context
export async function provisionWarehouse(
  store: RelationalStore,
  config: SnowflakeConfig,
): Promise<ProvisionReport> {
  console.log('🏗️  Provisioning Snowflake resources...');
  const completed: string[] = [];

  for (const step of provisioningSteps(config)) {
    try {
      await store.execute(step.statement);
    } catch (error) {
      console.error(`❌ Failed to create ${step.name}:`, errorMessage(error));
      return { success: false, completed, failedStep: step.name, error: errorMessage(error) };
    }
    completed.push(step.name);
    console.log(`  ✓ ${step.name}`);
  }

  console.log('✅ Snowflake resources ready');
  return { success: true, completed };
}
