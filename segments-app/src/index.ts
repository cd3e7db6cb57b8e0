import { createRepository } from './store.js';
import { systemClock } from './domain/clock.js';
import { buildServer } from './api/server.js';
import { ConfigError, loadConfig } from './config.js';
import type { AppConfig } from './config.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

const repo = createRepository(config.databaseUrl);
await repo.initializeSchema();

const app = buildServer(repo, systemClock, {
  logger: { level: config.logLevel },
  strictOperators: config.strictOperators,
});

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await repo.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await repo.close();
});
