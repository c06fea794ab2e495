import Fastify from 'fastify';
import pino from 'pino';

import { createPipeline } from './application/index.js';
import {
  createDiagnosticLogger,
  createPipelineDestination,
  createSinkFromConfig,
  loadEnvConfig,
  parseDsn,
  redactDsn,
} from './infrastructure/index.js';
import { pipelinePlugin, logRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the log collector.
 *
 * Order:
 * 1) Env config + DSN (the only fatal errors)
 * 2) Sink + pipeline
 * 3) Service logger, whose error lines also feed the pipeline
 * 4) HTTP routes, shutdown hooks, listen()
 */
async function main(): Promise<void> {
  const env = loadEnvConfig();
  const backend = parseDsn(env.dsn);

  // Separate logger for the pipeline itself, never routed into it.
  const diagnostics = createDiagnosticLogger(env.logLevel);
  const binding = createSinkFromConfig(backend, {
    serviceName: env.serviceName,
    timeoutMs: env.httpTimeoutMs,
    log: diagnostics,
  });
  const ac = new AbortController();

  const { handle, task } = createPipeline(binding.sink, env.pipeline, {
    log: diagnostics,
    signal: ac.signal,
  });

  const serviceLog = pino(
    { level: env.logLevel, name: 'collector' },
    pino.multistream([
      { level: env.logLevel, stream: process.stdout },
      {
        level: env.minLevel,
        stream: createPipelineDestination(handle, {
          minLevel: env.minLevel,
          serviceName: env.serviceName,
          log: diagnostics,
        }),
      },
    ]),
  );

  const fastify = Fastify({ loggerInstance: serviceLog });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(pipelinePlugin, { handle });
  await fastify.register(logRoutes);

  fastify.addHook('onClose', async () => {
    ac.abort();
    await task;
    await binding.close();
    diagnostics.info('Sink connections closed');
  });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({ host: env.host, port: env.port });

  fastify.log.info(
    { backend: backend.kind, dsn: redactDsn(backend.dsn), ...handle.config },
    'Log collector ready',
  );

  // Graceful shutdown on SIGINT / SIGTERM. Buffered records are not drained.
  const shutdown = (): void => {
    fastify.log.info('Shutting down collector...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        diagnostics.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start log collector',
    err,
  );

  process.exit(1);

});
