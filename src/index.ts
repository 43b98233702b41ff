import { buildApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const { app, store, logger, governance, oracle } = await buildApp(config);

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;

    logger.log('info', 'shutdown.start', { signal });
    try {
      await app.close();
      await store.flush();
      logger.log('info', 'shutdown.complete', { signal });
    } catch (error) {
      logger.log('error', 'shutdown.failed', { signal, error: String(error) });
      process.exitCode = 1;
    }
    logger.flush();
    process.exit();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }

  await app.listen({ port: config.app.port, host: config.app.host });

  const parameters = governance.getParameters();
  const oracleConfig = oracle.getConfig();
  logger.log('info', 'server.started', {
    host: config.app.host,
    port: config.app.port,
    env: config.app.env,
    admins: config.admin.addresses.length,
    stateFile: config.paths.stateFile ?? null,
    voteAccounting: config.governance.voteAccounting,
    quorumBps: parameters.quorumBps,
    timelockSeconds: parameters.timelockSeconds,
    proposals: parameters.proposalCount,
    aggregationMode: oracleConfig.mode,
    heartbeatTtlSeconds: oracleConfig.heartbeatTtlSeconds,
    sourceFailurePolicy: config.oracle.sourceFailurePolicy,
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
