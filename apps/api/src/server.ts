import { createApp } from './app';
import { loadEnv, toAppConfig } from './core/config/env';
import { connectDB, createPool, disconnectDB } from './core/db/client';
import { ensureSchema } from './core/db/schema';
import { createPgEventsRepository } from './modules/events/events.repository';

async function start() {
  const env = loadEnv();
  const pool = createPool(env);

  await connectDB(pool);
  await ensureSchema(pool);

  const app = createApp({
    config: toAppConfig(env),
    events: createPgEventsRepository(pool)
  });

  // Escuchar en 0.0.0.0 para que sea accesible desde la red local
  const server = app.listen(env.PORT, '0.0.0.0', () => {
    console.log(`🚀 API listening on http://0.0.0.0:${env.PORT}`);
    console.log(`🔗 Public pages served as ${env.PUBLIC_BASE_URL}/e/:id`);
  });

  const shutdown = () => {
    console.log('Shutting down gracefully...');
    server.close(() => {
      disconnectDB(pool)
        .then(() => process.exit(0))
        .catch((err) => {
          console.error('Failed to close database pool', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

start().catch((err) => {
  console.error('Failed to start server', err);
  process.exit(1);
});
