import fastify from 'fastify';
import formbody from '@fastify/formbody';
import multipart from '@fastify/multipart';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { Connector } from './connector';
import { metricsPlugin } from './plugins/metrics';
import { registerConnectorRoutes } from './routes/connector';
import { registerSystemRoutes } from './routes/system';
import { LocalVolumeDriver } from './volumes/localVolume';
import { VolumeRegistry } from './volumes/registry';

export type BuildAppOptions = {
  config?: ServiceConfig;
};

export function createVolumeRegistry(config: ServiceConfig): VolumeRegistry {
  return new VolumeRegistry(
    config.volumes.map(
      (volume) =>
        new LocalVolumeDriver({
          id: volume.id,
          rootPath: volume.root,
          alias: volume.alias,
          copyOverwrite: config.copyOverwrite
        })
    )
  );
}

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();

  const app = fastify({
    logger: {
      level: config.logLevel
    }
  });

  await app.register(formbody);
  await app.register(multipart, {
    limits: {
      fileSize: config.uploads.maxSizeBytes
    }
  });
  await app.register(metricsPlugin, { enabled: config.metricsEnabled });

  const volumes = createVolumeRegistry(config);
  const connector = new Connector({
    volumes,
    logger: app.log,
    settings: {
      uploadMaxSize: config.uploads.maxSize,
      disabled: config.disabledCommands,
      archivers: config.archivers,
      copyOverwrite: config.copyOverwrite
    }
  });

  await registerSystemRoutes(app, volumes);
  await registerConnectorRoutes(app, { connector, stagingDir: config.uploads.stagingDir });

  app.log.debug({ volumes: volumes.describe(), commands: connector.listCommands() }, 'connector configured');

  return { app, config, connector, volumes };
}
