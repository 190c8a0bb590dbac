#!/usr/bin/env node

import { loadEnvConfig } from './config';
import { DB, resolveDbPath } from './db';
import { countVideos, previewVideos, readCsvFile, uploadCsv } from './ingest';
import { provisionWarehouse } from './provision';
import { SnowflakeSqlStore } from './snowflake';

const command = process.argv[2];
const args = process.argv.slice(3);

function usage() {
  console.log('Usage:');
  console.log('  npm run init                       - Create warehouse, database, schema, table and search service');
  console.log('  npm run upload [path/to/file.csv]  - Replace the table contents with a CSV (default: CSV_PATH)');
  console.log('  video-search preview               - Show the first rows of the table');
  console.log('  video-search count                 - Show the number of rows in the table');
  console.log('\nExpected CSV headers: Title, Thumbnail URL, Description, Year');
}

async function main() {
  const config = loadEnvConfig();
  const snowflake = config.snowflake;
  if (!snowflake) {
    console.error('❌ Error: SNOWFLAKE_ACCOUNT and SNOWFLAKE_TOKEN not found in environment');
    console.error('Please create a .env file (see .env.example)');
    process.exit(1);
  }

  const store = new SnowflakeSqlStore(snowflake);

  switch (command) {
    case 'init': {
      const report = await provisionWarehouse(new SnowflakeSqlStore(snowflake, { useContext: false }), snowflake);
      if (!report.success) process.exit(1);
      break;
    }

    case 'upload': {
      const csvPath = args.find(arg => !arg.startsWith('--')) || config.csvPath;
      const db = new DB(resolveDbPath(config.dataDir));
      try {
        await uploadCsv(store, db, snowflake.table, readCsvFile(csvPath), csvPath);
      } finally {
        db.close();
      }
      break;
    }

    case 'preview': {
      const rows = await previewVideos(store, snowflake.table);
      if (rows.length === 0) {
        console.log('No data available in the table yet.');
      } else {
        console.table(rows);
      }
      break;
    }

    case 'count':
      console.log(`📊 ${await countVideos(store, snowflake.table)} videos in ${snowflake.table}`);
      break;

    default:
      usage();
      process.exit(1);
  }
}

main().catch(error => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
