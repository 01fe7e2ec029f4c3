import { promises as fs } from 'node:fs';
import { buildApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';

async function start(): Promise<void> {
  const config = loadServiceConfig();
  const { app, volumes } = await buildApp({ config });

  await fs.mkdir(config.uploads.stagingDir, { recursive: true });
  // Unreadable roots keep /ready at 503 but do not stop the service.
  for (const { id, reason, error } of await volumes.findUnreadable()) {
    app.log.warn({ err: error, volumeId: id, reason }, 'volume root is not readable');
  }

  try {
    await app.listen({ host: config.host, port: config.port });
    app.log.info(
      { host: config.host, port: config.port, volumes: volumes.describe(), stagingDir: config.uploads.stagingDir },
      'connector service listening'
    );
  } catch (err) {
    app.log.error({ err }, 'failed to start connector service');
    await app.close();
    throw err;
  }

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) {
      return;
    }
    closing = true;
    app.log.info({ signal }, 'shutting down connector');
    try {
      await app.close();
    } catch (closeErr) {
      app.log.error({ err: closeErr }, 'error during connector shutdown');
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

start().catch((err) => {
  console.error('[connector] fatal startup error', err);
  process.exit(1);
});
