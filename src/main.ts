import pino from 'pino';
import { loadConfig } from './config.js';
import { YamlPolicySource } from './ingest/sources.js';
import { buildServer } from './server.js';
import { createModerationService } from './service.js';

async function main() {
  const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: {
      target: 'pino-pretty',
      options: { colorize: true }
    }
  });

  const { config, path } = loadConfig();
  logger.info({ config: path ?? 'defaults' }, 'policyguard starting...');

  // Initialize components
  const service = createModerationService(config, logger);
  if (!service.auditLog.signing) {
    logger.warn({ key_dir: config.audit.key_dir }, 'No signing key found, audit records will be unsigned');
  }

  const source = new YamlPolicySource(config.policies.directory, logger.child({ component: 'policies' }));
  const report = await service.ingestor.ingestWithReport(source);
  if (report.upserted === 0) {
    logger.warn({ directory: config.policies.directory }, 'Policy index is empty; every decision will run without policy context');
  }

  const app = await buildServer(config, service, logger);

  // Start server
  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`policyguard listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
