import { createServer as createHttpServer } from 'http';

import { SettingsService, type Settings } from './config';
import { logger, setLogLevel } from './logger';
import { createCertificatePipeline } from './services/certificates/certificatePipeline';
import { MemoryObjectStore } from './services/storage/memoryObjectStore';
import type { ObjectStore } from './services/storage/objectStore';
import { createS3Client, S3ObjectStore } from './services/storage/s3ObjectStore';
import { createServer } from './server';

function createObjectStore(settings: Settings): { store: ObjectStore; dispose: () => void } {
  if (settings.storage.driver === 'memory') {
    logger.warn('[Storage] Using in-memory object store; artifacts are lost on restart');
    return { store: new MemoryObjectStore(), dispose: () => undefined };
  }
  const { bucket } = settings.storage;
  if (!bucket) {
    throw new Error('R2_BUCKET_NAME not set');
  }
  const client = createS3Client(settings.storage);
  return { store: new S3ObjectStore(client, bucket), dispose: () => client.destroy() };
}

async function bootstrap() {
  const settings = await SettingsService.getInstance().load();
  setLogLevel(settings.logLevel);

  const { store, dispose } = createObjectStore(settings);
  const pipeline = createCertificatePipeline(settings, store);
  const app = createServer({ settings: settings.server, pipeline });

  const server = createHttpServer(app);
  server.listen(settings.server.port, () => {
    logger.info(`Certificate service listening on http://localhost:${settings.server.port}`);
  });

  const gracefulShutdown = () => {
    logger.info('Shutting down certificate service...');
    server.close(() => {
      dispose();
      process.exit(0);
    });
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);
}

bootstrap().catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
