// src/main.ts
// Process entry: real dependencies, then listen.
import { config } from './config';
import { createLogger } from './observability';
import { createLlmClient } from './ai/modelRouter';
import { ActsRepository } from './reference/actsRepository';
import { buildServer, isProviderConfigured } from './server';

async function main() {
  const llm = createLlmClient(config.ai);
  const acts = new ActsRepository(config.reference.actsDir);
  acts.load();

  const app = await buildServer({ llm, acts });

  const providerConfigured = isProviderConfigured(config.ai);
  app.log.info({
    node: process.version,
    env: config.nodeEnv,
    provider: llm.provider,
    model: llm.defaultModel,
    providerConfigured,
    actsState: acts.getState().status,
  }, 'Contract analysis API boot');
  if (!providerConfigured) {
    app.log.warn({ provider: llm.provider }, 'API key missing; analyses will return fallback results');
  }

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port }, 'API listening');
}

// Module-level logger for startup errors
const startupLogger = createLogger('startup');

main().catch((err) => {
  startupLogger.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
