import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import type { DB } from './db';
import type { BindValue, RelationalStore, StoreRow, VideoRecord } from './types';

const INSERT_BATCH_SIZE = 250;
const PREVIEW_ROWS = 5;

// CSV header (lower-cased) → table column
const COLUMN_RENAMES: Record<string, keyof VideoRecord> = {
  'title': 'VIDEO_TITLE',
  'video_title': 'VIDEO_TITLE',
  'thumbnail url': 'THUMBNAIL',
  'thumbnail': 'THUMBNAIL',
  'description': 'VIDEO_DESCRIPTION',
  'video_description': 'VIDEO_DESCRIPTION',
  'year': 'VIDEO_YEAR',
  'video_year': 'VIDEO_YEAR',
};

export interface ParsedCsv {
  records: VideoRecord[];
  skipped: number;
}

export interface UploadReport {
  source: string;
  rowsLoaded: number;
  rowsSkipped: number;
}

export function renameColumn(header: string): string {
  return COLUMN_RENAMES[header.trim().toLowerCase()] ?? header.trim();
}

export function parseYearCell(value: string | undefined): number | undefined {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') return undefined;
  const year = Number(trimmed);
  return Number.isInteger(year) ? year : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cell(record: Record<string, unknown>, column: keyof VideoRecord): string | undefined {
  const value = record[column];
  return typeof value === 'string' ? value : undefined;
}

// Rows without a title or an integer year are skipped
export function parseVideoCsv(content: string): ParsedCsv {
  const parsed: unknown = parse(content, {
    columns: (headers: string[]) => headers.map(renameColumn),
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  const rows: unknown[] = Array.isArray(parsed) ? parsed : [];
  const records: VideoRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    if (!isRecord(row)) {
      skipped++;
      continue;
    }
    const title = cell(row, 'VIDEO_TITLE');
    const year = parseYearCell(cell(row, 'VIDEO_YEAR'));
    if (!title || year === undefined) {
      skipped++;
      continue;
    }
    records.push({
      VIDEO_TITLE: title,
      THUMBNAIL: cell(row, 'THUMBNAIL') ?? '',
      VIDEO_DESCRIPTION: cell(row, 'VIDEO_DESCRIPTION') ?? '',
      VIDEO_YEAR: year,
    });
  }

  return { records, skipped };
}

export function stagingTable(table: string): string {
  return `${table}_STAGING`;
}

// Rows go into a staging copy; the live table only changes at the swap
export async function loadVideos(
  store: RelationalStore,
  table: string,
  records: VideoRecord[],
  batchSize: number = INSERT_BATCH_SIZE,
): Promise<number> {
  const staging = stagingTable(table);
  await store.execute(`CREATE OR REPLACE TABLE ${staging} LIKE ${table}`);

  let loaded = 0;
  for (let start = 0; start < records.length; start += batchSize) {
    const batch = records.slice(start, start + batchSize);
    const placeholders = batch.map(() => '(?, ?, ?, ?)').join(', ');
    const binds: BindValue[] = batch.flatMap(rec => [
      rec.VIDEO_TITLE,
      rec.THUMBNAIL,
      rec.VIDEO_DESCRIPTION,
      rec.VIDEO_YEAR,
    ]);
    await store.execute(
      `INSERT INTO ${staging} (VIDEO_TITLE, THUMBNAIL, VIDEO_DESCRIPTION, VIDEO_YEAR) VALUES ${placeholders}`,
      binds,
    );
    loaded += batch.length;
    console.log(`  - Inserted ${loaded}/${records.length} rows`);
  }

  await store.execute(`ALTER TABLE ${table} SWAP WITH ${staging}`);
  await store.execute(`DROP TABLE IF EXISTS ${staging}`);
  return loaded;
}

export async function uploadCsv(
  store: RelationalStore,
  db: DB,
  table: string,
  content: string,
  source: string,
): Promise<UploadReport> {
  console.log(`📥 Loading videos from ${source}...`);
  const { records, skipped } = parseVideoCsv(content);
  console.log(`Found ${records.length} videos (${skipped} skipped)`);

  const rowsLoaded = await loadVideos(store, table, records);
  db.insertUpload({
    source,
    rows_loaded: rowsLoaded,
    rows_skipped: skipped,
    uploaded_at: new Date().toISOString(),
  });

  console.log(`✅ Upload complete: ${rowsLoaded} rows in ${table}`);
  return { source, rowsLoaded, rowsSkipped: skipped };
}

export function readCsvFile(csvPath: string): string {
  if (!fs.existsSync(csvPath)) {
    throw new Error(`CSV file not found: ${csvPath}`);
  }
  return fs.readFileSync(csvPath, 'utf-8');
}

export async function previewVideos(store: RelationalStore, table: string): Promise<StoreRow[]> {
  return store.execute(`SELECT * FROM ${table} LIMIT ${PREVIEW_ROWS}`);
}

export async function countVideos(store: RelationalStore, table: string): Promise<number> {
  const rows = await store.execute(`SELECT COUNT(*) AS TOTAL FROM ${table}`);
  return Number(rows[0]?.TOTAL ?? 0);
}
