import type { SnowflakeConfig } from './config';
import { CollaboratorUnavailableError, toCollaboratorError } from './errors';
import type { BindValue, RelationalStore, StoreRow } from './types';

export type FetchLike = typeof fetch;

export interface SnowflakeStoreOptions {
  // Send warehouse/database/schema with each statement. Off while provisioning,
  // since those objects may not exist yet.
  useContext?: boolean;
  pollIntervalMs?: number;
  fetchImpl?: FetchLike;
}

interface SqlApiBinding {
  type: 'TEXT' | 'FIXED' | 'REAL' | 'BOOLEAN';
  value: string | null;
}

interface SqlApiResult {
  statementHandle?: string;
  statementStatusUrl?: string;
  message?: string;
  resultSetMetaData?: {
    rowType?: Array<{ name: string }>;
    partitionInfo?: Array<{ rowCount: number }>;
  };
  data?: Array<Array<string | null>>;
}

export function snowflakeBaseUrl(account: string): string {
  return `https://${account.toLowerCase()}.snowflakecomputing.com`;
}

export function snowflakeHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    'X-Snowflake-Authorization-Token-Type': 'PROGRAMMATIC_ACCESS_TOKEN',
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
}

export function toBindings(binds: BindValue[]): Record<string, SqlApiBinding> {
  const bindings: Record<string, SqlApiBinding> = {};
  binds.forEach((value, i) => {
    const key = String(i + 1);
    if (value === null) {
      bindings[key] = { type: 'TEXT', value: null };
    } else if (typeof value === 'boolean') {
      bindings[key] = { type: 'BOOLEAN', value: String(value) };
    } else if (typeof value === 'number') {
      bindings[key] = { type: Number.isInteger(value) ? 'FIXED' : 'REAL', value: String(value) };
    } else {
      bindings[key] = { type: 'TEXT', value };
    }
  });
  return bindings;
}

function isSqlApiResult(body: unknown): body is SqlApiResult {
  return typeof body === 'object' && body !== null;
}

export class SnowflakeSqlStore implements RelationalStore {
  private readonly baseUrl: string;
  private readonly useContext: boolean;
  private readonly pollIntervalMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: SnowflakeConfig,
    options: SnowflakeStoreOptions = {},
  ) {
    this.baseUrl = snowflakeBaseUrl(config.account);
    this.useContext = options.useContext ?? true;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async execute(statement: string, binds: BindValue[] = []): Promise<StoreRow[]> {
    const body: Record<string, unknown> = {
      statement,
      timeout: this.config.statementTimeout,
    };
    if (binds.length > 0) {
      body.bindings = toBindings(binds);
    }
    if (this.useContext) {
      body.warehouse = this.config.warehouse;
      body.database = this.config.database;
      body.schema = this.config.schema;
    }
    if (this.config.role) {
      body.role = this.config.role;
    }

    let result = await this.request('/api/v2/statements', {
      method: 'POST',
      body: JSON.stringify(body),
    });

    const deadline = Date.now() + this.config.statementTimeout * 1000;
    while (result.status === 202) {
      if (Date.now() > deadline) {
        throw new CollaboratorUnavailableError(
          `Statement did not finish within ${this.config.statementTimeout}s`,
          'store',
          202,
        );
      }
      const statusUrl = result.body.statementStatusUrl;
      if (!statusUrl) {
        throw new CollaboratorUnavailableError('SQL API accepted the statement without a status URL', 'store', 202);
      }
      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
      result = await this.request(statusUrl, { method: 'GET' });
    }

    return this.collectRows(result.body);
  }

  private async collectRows(first: SqlApiResult): Promise<StoreRow[]> {
    const columns = (first.resultSetMetaData?.rowType ?? []).map(col => col.name);
    const data = [...(first.data ?? [])];

    const partitions = first.resultSetMetaData?.partitionInfo ?? [];
    for (let partition = 1; partition < partitions.length; partition++) {
      if (!first.statementHandle) break;
      const next = await this.request(
        `/api/v2/statements/${first.statementHandle}?partition=${partition}`,
        { method: 'GET' },
      );
      data.push(...(next.body.data ?? []));
    }

    return data.map(values => {
      const row: StoreRow = {};
      columns.forEach((name, i) => {
        row[name] = values[i] ?? null;
      });
      return row;
    });
  }

  private async request(
    path: string,
    init: { method: 'GET' | 'POST'; body?: string },
  ): Promise<{ status: number; body: SqlApiResult }> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: snowflakeHeaders(this.config.token),
      });
    } catch (error) {
      throw toCollaboratorError(error, 'store');
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new CollaboratorUnavailableError(
        `Snowflake SQL API error (${response.status}): ${errorText}`,
        'store',
        response.status,
      );
    }

    const body: unknown = await response.json();
    if (!isSqlApiResult(body)) {
      throw new CollaboratorUnavailableError('Snowflake SQL API returned an unexpected body', 'store', response.status);
    }
    return { status: response.status, body };
  }
}
