import express from 'express';
import { DB, resolveDbPath } from './db';
import { loadEnvConfig, type AppConfig } from './config';
import { CachedCompletionService, OpenAICompletionService } from './completion';
import { errorMessage } from './errors';
import { countVideos, previewVideos, readCsvFile, uploadCsv } from './ingest';
import { toSessionView } from './presenter';
import { provisionWarehouse } from './provision';
import { CortexSearchIndex } from './search';
import { QuerySessionController } from './session';
import { SessionRegistry } from './sessions';
import { SnowflakeSqlStore } from './snowflake';
import type { ActionOutcome, RelationalStore, YearRange } from './types';

export interface AppServices {
  config: AppConfig;
  db: DB;
  registry: SessionRegistry;
  // Unset while Snowflake or OpenAI credentials are missing
  controller?: QuerySessionController;
  store?: RelationalStore;
  provisionStore?: RelationalStore;
}

export function buildServices(config: AppConfig): AppServices {
  const db = new DB(resolveDbPath(config.dataDir));
  const registry = new SessionRegistry(config.sessionTtlMinutes * 60 * 1000);
  if (!config.snowflake) {
    return { config, db, registry };
  }

  const store = new SnowflakeSqlStore(config.snowflake);
  const provisionStore = new SnowflakeSqlStore(config.snowflake, { useContext: false });
  const controller = config.openaiApiKey
    ? new QuerySessionController({
        index: new CortexSearchIndex(config.snowflake, store),
        completion: new CachedCompletionService(new OpenAICompletionService(config.openaiApiKey), db),
        model: config.completionModel,
      })
    : undefined;

  return { config, db, registry, controller, store, provisionStore };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// null when present but malformed
export function parseYearRange(value: unknown): YearRange | undefined | null {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return null;
  const { minYear, maxYear } = value;
  if (typeof minYear !== 'number' || typeof maxYear !== 'number') return null;
  if (!Number.isInteger(minYear) || !Number.isInteger(maxYear)) return null;
  return { minYear, maxYear };
}

export function createApp(services: AppServices): express.Express {
  const { config, db, registry, controller, store, provisionStore } = services;
  const table = config.snowflake?.table ?? 'VIDEOS';
  const app = express();

  app.use(express.json());
  app.use(express.static('public'));

  const sendOutcome = (res: express.Response, outcome: ActionOutcome) => {
    res.json({ success: true, view: toSessionView(outcome.state), notices: outcome.notices });
  };

  // API: Check environment variables
  app.get('/api/check-env', (req, res) => {
    res.json({
      snowflake_configured: !!config.snowflake,
      openai_configured: !!config.openaiApiKey,
      completion_model: config.completionModel,
    });
  });

  // API: Start a search session
  app.post('/api/session', (req, res) => {
    res.json({ success: true, sessionId: registry.create() });
  });

  // API: Current view of a session
  app.get('/api/session/:id', (req, res) => {
    const state = registry.get(req.params.id);
    if (!state) {
      return res.status(404).json({ success: false, error: 'Unknown session' });
    }
    res.json({ success: true, view: toSessionView(state), notices: [] });
  });

  // API: New search (always page 1)
  app.post('/api/search', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.sessionId !== 'string' || typeof body.query !== 'string') {
      return res.status(400).json({ success: false, error: 'sessionId and query are required' });
    }
    const yearRange = parseYearRange(body.yearRange);
    if (yearRange === null) {
      return res.status(400).json({ success: false, error: 'yearRange needs integer minYear and maxYear' });
    }
    if (!controller) {
      return res.status(503).json({ success: false, error: 'Search is not configured' });
    }

    const query = body.query;
    try {
      const outcome = await registry.dispatch(body.sessionId, state =>
        controller.submitSearch(state, query, yearRange),
      );
      if (!outcome) {
        return res.status(404).json({ success: false, error: 'Unknown session' });
      }
      sendOutcome(res, outcome);
    } catch (error) {
      console.error('Search failed:', errorMessage(error));
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // API: Navigate the current result set
  app.post('/api/page', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.sessionId !== 'string' || typeof body.page !== 'number') {
      return res.status(400).json({ success: false, error: 'sessionId and page are required' });
    }
    if (!controller) {
      return res.status(503).json({ success: false, error: 'Search is not configured' });
    }

    const page = body.page;
    try {
      const outcome = await registry.dispatch(body.sessionId, state => controller.goToPage(state, page));
      if (!outcome) {
        return res.status(404).json({ success: false, error: 'Unknown session' });
      }
      sendOutcome(res, outcome);
    } catch (error) {
      console.error('Page navigation failed:', errorMessage(error));
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // API: Create warehouse, database, schema, table and search service
  app.post('/api/init', async (req, res) => {
    if (!provisionStore || !config.snowflake) {
      return res.status(503).json({ success: false, error: 'Snowflake is not configured' });
    }
    try {
      const report = await provisionWarehouse(provisionStore, config.snowflake);
      res.status(report.success ? 200 : 500).json(report);
    } catch (error) {
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // API: Load a CSV (request body, or the configured file when empty)
  app.post('/api/upload', express.text({ type: ['text/csv', 'text/plain'], limit: '50mb' }), async (req, res) => {
    if (!store) {
      return res.status(503).json({ success: false, error: 'Snowflake is not configured' });
    }
    try {
      const body: unknown = req.body;
      const uploaded = typeof body === 'string' && body.trim() !== '';
      const content = uploaded ? body : readCsvFile(config.csvPath);
      const source = uploaded ? req.get('x-file-name') || 'upload.csv' : config.csvPath;
      const report = await uploadCsv(store, db, table, content, source);
      res.json({ success: true, ...report });
    } catch (error) {
      console.error('Upload failed:', errorMessage(error));
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // API: First rows of the table
  app.get('/api/preview', async (req, res) => {
    if (!store) {
      return res.status(503).json({ success: false, error: 'Snowflake is not configured' });
    }
    try {
      res.json({ success: true, rows: await previewVideos(store, table) });
    } catch (error) {
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // API: Row count
  app.get('/api/count', async (req, res) => {
    if (!store) {
      return res.status(503).json({ success: false, error: 'Snowflake is not configured' });
    }
    try {
      res.json({ success: true, count: await countVideos(store, table) });
    } catch (error) {
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // API: Upload history
  app.get('/api/uploads', (req, res) => {
    try {
      res.json({ success: true, uploads: db.getRecentUploads() });
    } catch (error) {
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  return app;
}

if (require.main === module) {
  const config = loadEnvConfig();
  const app = createApp(buildServices(config));

  app.listen(config.port, () => {
    console.log(`\n🚀 Video search UI running at http://localhost:${config.port}`);
    console.log(`\n📝 Workflow:`);
    console.log(`   1. Upload Data: initialize Snowflake and load the CSV`);
    console.log(`   2. Search Videos: ask in natural language, filter by year`);
    console.log(`   3. Page through results and read the top-3 summary\n`);
    if (!config.snowflake) console.warn('⚠️  SNOWFLAKE_ACCOUNT / SNOWFLAKE_TOKEN not set - search and upload disabled');
    if (!config.openaiApiKey) console.warn('⚠️  OPENAI_API_KEY not set - search disabled');
  });
}
