import Fastify, { type FastifyError } from 'fastify';
import formbody from '@fastify/formbody';
import multipart from '@fastify/multipart';
import { config } from './config';
import { PasteError, type PasteErrorCode } from './errors';
import { registerHelpRoutes } from './routes/help';
import { BadFormError, formatMiB, registerPasteRoutes } from './routes/paste';
import { PasteService } from './service/pasteService';
import type { PasteStore } from './contracts/pasteStore';
import type { Clock } from './types';

export interface BuildAppOptions {
  store: PasteStore;
  clock?: Clock;
  logger?: boolean;
  helpPath?: string;
  nameLength?: number;
  /** Take the client address from X-Forwarded-For (set when behind a reverse proxy). */
  trustProxy?: boolean;
}

// paths served by this app that would otherwise shadow GET /:name
const RESERVED_NAMES = ['health'];

const PASTE_ERRORS: Record<PasteErrorCode, { status: number; message: string }> = {
  not_found: { status: 404, message: 'Paste not found' },
  gone: { status: 410, message: 'Paste is no longer available' },
  unauthorized: { status: 401, message: 'Invalid password' },
  name_taken: { status: 409, message: 'This name is already taken' },
  invalid_expiry: { status: 422, message: 'Invalid expiration format' },
  negative_expiry: { status: 400, message: 'Expiration must not be negative' },
};

const SERVER_ERROR = '500 - Something bad happened';

export async function buildApp(opts: BuildAppOptions) {
  const app = Fastify({ logger: opts.logger ?? false, trustProxy: opts.trustProxy ?? false });
  const service = new PasteService({
    store: opts.store,
    clock: opts.clock,
    nameLength: opts.nameLength ?? config.names.length,
    maxNameAttempts: config.names.maxAttempts,
    reservedNames: RESERVED_NAMES,
  });

  await app.register(formbody);
  // text fields and file parts both land on req.body as plain values
  await app.register(multipart, {
    attachFieldsToBody: 'keyValues',
    limits: { fieldSize: config.limits.editBytes, fileSize: config.limits.editBytes },
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const text = (status: number, message: string) =>
      reply.code(status).type('text/plain; charset=utf-8').send(`${status} - ${message}`);

    if (err instanceof PasteError) {
      const { status, message } = PASTE_ERRORS[err.code];
      return text(status, message);
    }
    if (err instanceof BadFormError) {
      return text(err.statusCode, err.message);
    }
    if (err.code === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      const limit = req.method === 'PUT' ? config.limits.editBytes : config.limits.uploadBytes;
      return text(413, `Max content size is ${formatMiB(limit)}`);
    }
    if (err.statusCode && err.statusCode < 500) {
      return text(err.statusCode, err.message);
    }

    req.log.error({ err }, 'Request failed');
    return reply.code(500).type('text/plain; charset=utf-8').send(SERVER_ERROR);
  });

  app.get('/health', async () => {
    try {
      await opts.store.ping();
      return { status: 'ok', redis: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Redis health check failed');
      return { status: 'degraded', redis: 'error' };
    }
  });

  await registerHelpRoutes(app, { helpPath: opts.helpPath ?? config.helpPath });
  await registerPasteRoutes(app, {
    service,
    uploadLimitBytes: config.limits.uploadBytes,
    editLimitBytes: config.limits.editBytes,
  });
  return app;
}

export type PasteApp = Awaited<ReturnType<typeof buildApp>>;
