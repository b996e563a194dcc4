import Fastify, { type FastifyInstance } from 'fastify';
import type { EnvConfig } from './config.js';
import { closeDb, getDb } from './db/client.js';
import { registerRotationRoutes } from './routes/rotation.js';
import { createController, intervalFor, rendererFor } from './services/bootstrap.js';
import { ControlClient } from './services/control-client.js';
import { RotationDaemon } from './services/daemon.js';
import { setCurrentMode } from './services/settings.js';
import type { CatalogKind } from './rotation/types.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

export function buildServer(daemon: RotationDaemon): FastifyInstance {
  const fastify = Fastify({
    logger: false, // We use pino directly
  });
  registerRotationRoutes(fastify, daemon);
  return fastify;
}

/**
 * Long-running mode: own the catalog for `kind`, rotate it every interval
 * and serve the control API on loopback until SIGINT/SIGTERM.
 */
export async function runDaemon(config: EnvConfig, kind: CatalogKind): Promise<void> {
  const running = await new ControlClient(config.CONTROL_PORT).probe();
  if (running) {
    throw new Error(`A daemon rotating the ${running} catalog is already listening on port ${config.CONTROL_PORT}`);
  }

  const renderer = rendererFor(config, kind);
  if (!(await renderer.isAvailable())) {
    logger.warn({ renderer: renderer.name }, 'Renderer not found on PATH, rotations will fail until it is installed');
  }

  const handle = getDb();
  const controller = createController(config, handle, kind);
  const count = await controller.open();

  try {
    setCurrentMode(handle.db, kind);
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, 'Could not record current mode');
  }

  const daemon = new RotationDaemon(controller, intervalFor(config, kind));
  const fastify = buildServer(daemon);

  await fastify.listen({ port: config.CONTROL_PORT, host: '127.0.0.1' });

  logger.info(
    { catalog: kind, wallpapers: count, interval: intervalFor(config, kind), port: config.CONTROL_PORT },
    'wallrotor daemon started',
  );
  daemon.start();

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutdown signal received');
      daemon.stop()
        .then(() => fastify.close())
        .catch((err: unknown) => logger.error({ err: errorMessage(err) }, 'Shutdown failed'))
        .finally(() => {
          closeDb();
          resolve();
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
}
