import { pino } from 'pino';
import { initEnv, loadSettings } from '@rioplatense/config';
import { errorMessage } from '@rioplatense/core';
import { createTranslator } from './bootstrap.js';
import { buildServer } from './server.js';

// .env must be loaded before settings are read
const { repoRoot, envFilePath, loaded } = initEnv();

if (!loaded) {
  console.warn(`⚠️  WARNING: .env file not found at: ${envFilePath}`);
  console.warn(`   Continuing with environment variables from process.env`);
}

const DEV_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000', 'http://localhost:5173'];

async function startServer() {
  const settings = loadSettings(process.env, { baseDir: repoRoot });
  const isProduction = process.env.NODE_ENV === 'production';

  const logger = pino({
    level: settings.logLevel,
    ...(isProduction
      ? {}
      : {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }),
  });

  const allowedOrigins = settings.corsOrigins.length > 0 || isProduction ? settings.corsOrigins : DEV_ORIGINS;
  logger.info({ event: 'cors.config', origins: allowedOrigins, isProduction }, 'CORS configured');

  const translator = await createTranslator(settings);
  const fastify = await buildServer({ translator, logger, allowedOrigins });

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    try {
      await fastify.close();
      process.exit(0);
    } catch (err) {
      logger.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  await fastify.listen({ port: settings.port, host: settings.host });
  logger.info(`🚀 API server started successfully`);
  logger.info(`   Listening on http://${settings.host}:${settings.port}`);
  logger.info(`   Health check: http://${settings.host}:${settings.port}/health`);
  logger.info(`   Translate: POST http://${settings.host}:${settings.port}/translate`);
}

startServer().catch((err: unknown) => {
  console.error(`Fatal error starting server: ${errorMessage(err)}`);
  process.exit(1);
});
