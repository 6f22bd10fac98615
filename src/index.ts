import { buildServer } from './api/server.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  const server = await buildServer({ config: cfg });
  const port = cfg.server.port;
  await server.listen({ port, host: '0.0.0.0' });
  getLogger().info({ port, sessionDir: cfg.paths.sessionDir }, 'Status API started');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
