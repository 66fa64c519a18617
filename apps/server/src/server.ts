import Fastify, { type FastifyInstance } from 'fastify';
import type { AppConfig } from './config/app.config';
import { registerPageRoutes } from './routes/pages.route';
import type { LoggerService } from './services/logger.service';
import { TemplateRenderer } from './templates/renderer';
import { TemplateCache } from './templates/templateCache';
import { TemplateLoader, type TemplateHelpers } from './templates/templateLoader';
import { normalizeError, toHttpError } from './utils/error-response';

export interface BuildServerOptions {
  config: AppConfig;
  logger: LoggerService;
  helpers?: TemplateHelpers;
  /** Injected for tests that need to inspect what was compiled. */
  cache?: TemplateCache;
}

export interface PageServer {
  fastify: FastifyInstance;
  renderer: TemplateRenderer;
  cache: TemplateCache;
}

export function buildServer({ config, logger, helpers, cache = new TemplateCache() }: BuildServerOptions): PageServer {
  // Logging goes through LoggerService; Fastify's pino logger stays off.
  const fastify = Fastify({ logger: false });

  const loader = new TemplateLoader({ templatesDir: config.templatesDir, helpers });
  const renderer = new TemplateRenderer({ useCache: config.useCache }, loader, cache, logger);

  fastify.get('/healthz', async () => ({ ok: true }));
  registerPageRoutes(fastify, renderer);

  fastify.setNotFoundHandler((req, reply) => {
    reply.code(404).send(normalizeError(`Route ${req.method} ${req.url} not found`, { defaultCode: 'not_found' }));
  });

  fastify.setErrorHandler((err, req, reply) => {
    const { statusCode, body } = toHttpError(err);
    if (statusCode >= 500) logger.error(`Unhandled error on ${req.method} ${req.url}`, err);
    reply.code(statusCode).send(body);
  });

  return { fastify, renderer, cache };
}
