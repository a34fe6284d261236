// apps/http/src/index.ts
import { loadConfig } from './config';
import { seedLibrary } from './seed';
import { buildApp } from './app';

async function main() {
  const config = loadConfig();
  const db = seedLibrary();
  const app = await buildApp({ config, db });

  app.log.info(
    {
      kinds: db.store.kinds().map((k) => k.name),
      reportMinDuration: config.reportMinDuration,
      rateLimitMax: config.rateLimitMax
    },
    'library-seeded'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`HTTP on :${config.port}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
