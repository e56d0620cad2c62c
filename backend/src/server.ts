import fs from 'fs';
import path from 'path';

function loadDotEnv(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envPath)) {
    return;
  }

  const contents = fs.readFileSync(envPath, 'utf8');
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const separatorIndex = trimmed.indexOf('=');
    if (separatorIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, separatorIndex).trim();
    if (!key) {
      continue;
    }

    let value = trimmed.slice(separatorIndex + 1).trim();
    const hasMatchingQuotes =
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"));
    if (hasMatchingQuotes) {
      value = value.slice(1, -1);
    }

    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadDotEnv();

// Loaded after the .env file so that configuration reads see its values.
const { createApp } = require('./app') as typeof import('./app');
const constants = require('./config/constants') as typeof import('./config/constants');
const { CampaignService } = require('./services/CampaignService') as typeof import('./services/CampaignService');
const { SqliteLedgerStore } = require('./db/SQLiteStore') as typeof import('./db/SQLiteStore');
const { MemoryLedgerStore } = require('./store/memoryStore') as typeof import('./store/memoryStore');

async function main(): Promise<void> {
  const backend = constants.getStoreBackend();
  const store = backend === 'memory' ? new MemoryLedgerStore() : await SqliteLedgerStore.open();
  const service = await CampaignService.load({
    store,
    registryOwner: constants.getRegistryOwner(),
  });

  const port = constants.getPort();
  const host = constants.getHost();
  const app = createApp(service);

  app.listen(port, host, () => {
    if (process.env.NODE_ENV !== 'production') {
      const dbPath = backend === 'sqlite' ? constants.getSqlitePath() : 'unused';
      console.log(`[config] store=${backend} sqlitePath=${dbPath} registryOwner=${service.registry.owner}`);
    }
    console.log(`Tierfund backend listening on http://${host}:${port}`);
  });
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[server] failed to start: ${message}`);
  process.exitCode = 1;
});
