import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify from 'fastify';
import fastifyStatic from '@fastify/static';
import { healthRoutes } from './routes/health.js';
import { rankingsRoutes } from './routes/rankings.js';
import { chartsRoutes } from './routes/charts.js';
import { config } from '../config.js';
import { loggerOptions } from '../utils/logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export interface ServerOptions {
  reportsDir?: string;
  logger?: boolean;
}

export async function createServer(options: ServerOptions = {}) {
  const reportsDir = options.reportsDir ?? config.REPORTS_DIR;
  const app = Fastify({
    logger: options.logger === false ? false : loggerOptions,
  });

  // Ranking table page and chart dashboard
  await app.register(fastifyStatic, {
    root: path.join(__dirname, '..', '..', 'public'),
    prefix: '/',
  });

  await app.register(healthRoutes, { reportsDir });
  await app.register(rankingsRoutes, { prefix: '/rankings', reportsDir });
  await app.register(chartsRoutes, { prefix: '/charts', reportsDir });

  return app;
}
