import 'dotenv/config';
import { createTextAugmenter } from './augment/gemini';
import { createApp, StorageKind } from './api/routes';
import { AppConfig, loadConfig } from './config';
import { createCollectorBinder } from './core/collectorFactory';
import { describeError } from './core/errors';
import { JobController } from './core/jobController';
import { Orchestrator } from './core/orchestrator';
import { FileSessionArchive } from './core/sessionArchive';
import { LeadStore } from './store/leadStore';
import { MemoryLeadStore } from './store/memoryLeadStore';
import { PgLeadStore } from './store/pgLeadStore';
import { log } from './utils/logger';

const openStore = async (config: AppConfig): Promise<{ store: LeadStore; storage: StorageKind }> => {
  if (!config.databaseUrl) {
    log('WARN', 'DATABASE_URL not set, leads are kept in memory only');
    return { store: new MemoryLeadStore(), storage: 'memory' };
  }
  const store = PgLeadStore.connect(config.databaseUrl);
  await store.ensureSchema();
  return { store, storage: 'postgres' };
};

const main = async () => {
  const config = loadConfig();
  const { store, storage } = await openStore(config);
  const augmenter = createTextAugmenter(config.gemini);
  if (!augmenter) log('INFO', 'GEMINI_API_KEY not set, message drafting disabled');

  const orchestrator = new Orchestrator({
    job: new JobController(),
    store,
    bindCollectors: createCollectorBinder(config),
    defaultCities: config.defaultCities,
    augmenter,
    archive: new FileSessionArchive(config.sessionArchiveDir),
    industry: config.industry,
    draftSampleSize: config.draftSampleSize,
    limits: config.limits,
  });

  const app = createApp({ orchestrator, store, storage, apiKey: config.apiKey });
  const server = app.listen(config.port, () =>
    log('INFO', `lead aggregator listening on ${config.port} (${orchestrator.industryInfo().name}, ${storage} store)`),
  );

  const shutdown = async () => {
    orchestrator.stop();
    await orchestrator.whenIdle();
    await store.close();
    server.close(() => process.exit(0));
  };
  const onSignal = () => {
    shutdown().catch((error) => {
      log('ERROR', 'shutdown failed', describeError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
};

main().catch((error) => {
  log('ERROR', 'startup failed', describeError(error));
  process.exit(1);
});
