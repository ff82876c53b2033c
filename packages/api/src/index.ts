import { serve } from '@hono/node-server';
import { loadConfig } from '@searchwise/schemas/src/config-loader.js';
import { createServices } from '@searchwise/core/src/orchestration/create-services.js';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);

  const config = await loadConfig({ configPath: process.env['SEARCHWISE_CONFIG'] });
  const { orchestrator, transcriptStore } = createServices(config);

  const app = createApp({ orchestrator, transcriptStore });

  log.info({ port, mock: config.mock }, 'Starting Searchwise API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Searchwise API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
