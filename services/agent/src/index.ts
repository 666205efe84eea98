import { readFile } from 'node:fs/promises';
import { logger, loadModelConfig, createCompletionClient } from '@rxdesk/shared';
import { loadConfig } from './config.js';
import { getDb, closeDb, seedDatabase } from './db.js';
import { ToolStats, createSqliteStatsStore } from './tool-stats.js';
import { ToolRegistry } from './tool-registry.js';
import { createPharmacyTools } from './tools/index.js';
import { createAgent } from './agent.js';
import { createApi } from './api.js';

const log = logger.child({ module: 'agent-service' });

async function main() {
  log.info('starting agent service');

  const config = loadConfig();

  const db = getDb(config.dataDir);
  if (config.seedDatabase) {
    seedDatabase(db);
  }

  const stats = new ToolStats(createSqliteStatsStore(db));
  stats.hydrate();

  const registry = new ToolRegistry(createPharmacyTools(db), { stats, timeoutMs: config.toolTimeoutMs });

  const modelConfig = await loadModelConfig();
  const completionClient = createCompletionClient(modelConfig);
  const systemPrompt = await readFile(config.systemPromptPath, 'utf-8');

  const agent = createAgent({
    completionClient,
    registry,
    systemPrompt,
    maxToolRounds: config.maxToolRounds,
    completionTimeoutMs: config.completionTimeoutMs,
  });

  const app = createApi({
    agent,
    registry,
    stats,
    corsOrigins: config.corsOrigins,
    authToken: config.authToken,
  });

  const server = app.listen(config.port, () => {
    log.info(
      { port: config.port, provider: modelConfig.provider, model: modelConfig.model, tools: registry.size },
      'agent API listening',
    );
  });

  // Graceful shutdown
  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'shutting down');
    server.close((err) => {
      if (err) log.warn({ err }, 'server close failed');
      closeDb();
      process.exit(0);
    });
    server.closeAllConnections();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  log.fatal({ err }, 'agent service failed to start');
  process.exit(1);
});
