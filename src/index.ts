// LeetCode Q&A API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { env, logConfiguration } from './env.js';
import { loggerOptions } from './logger.js';
import { createQuestionAnswerer } from './services/orchestrator/index.js';

const PORT = env.PORT;
const HOST = env.HOST;

const server = await buildServer({
  answerer: createQuestionAnswerer(),
  logger: loggerOptions,
});

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  server.log.info(`Q&A API listening on http://${HOST}:${PORT}`);
  server.log.info(`Health: http://${HOST}:${PORT}/v1/health`);
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
