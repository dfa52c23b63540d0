import type { FastifyInstance, FastifyRequest, onRequestAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import { PasteError } from '../errors';
import type { PasteService } from '../service/pasteService';

export interface PasteRouteOptions {
  service: PasteService;
  uploadLimitBytes: number;
  editLimitBytes: number;
}

// form values: repeated keys keep the first value; multipart file parts arrive as buffers
const field = z.preprocess((v) => {
  const first: unknown = Array.isArray(v) ? v[0] : v;
  return Buffer.isBuffer(first) ? first.toString('utf8') : first;
}, z.string().optional());

const formSchema = z.object({
  f: field,
  name: field,
  e: field,
  ap: field,
  ep: field,
});

type Form = z.infer<typeof formSchema>;

const paramsSchema = z.object({ name: z.string().min(1) });

/** Raised for input the routes reject before the paste service is involved. */
export class BadFormError extends Error {
  constructor(
    readonly statusCode: 400 | 413,
    message: string,
  ) {
    super(message);
    this.name = 'BadFormError';
  }
}

/** Body fields win over query fields, like a classic HTML form handler. */
function readForm(req: FastifyRequest): Form {
  const query = formSchema.safeParse(req.query ?? {});
  const body = formSchema.safeParse(req.body ?? {});
  const fromQuery: Form = query.success ? query.data : {};
  const fromBody: Form = body.success ? body.data : {};
  return {
    f: fromBody.f ?? fromQuery.f,
    name: fromBody.name ?? fromQuery.name,
    e: fromBody.e ?? fromQuery.e,
    ap: fromBody.ap ?? fromQuery.ap,
    ep: fromBody.ep ?? fromQuery.ep,
  };
}

function requirePayload(form: Form): string {
  if (!form.f) throw new BadFormError(400, '"f" field required');
  return form.f;
}

export function formatMiB(bytes: number) {
  return `${Math.round(bytes / (1024 * 1024))}MiB`;
}

/**
 * Rejects a declared body over `limit` before it is read. Multipart bodies
 * skip Fastify's `bodyLimit`, so both encodings go through this.
 */
function maxContentLength(limit: number): onRequestAsyncHookHandler {
  return async (req) => {
    const declared = Number(req.headers['content-length']);
    if (declared > limit) throw new BadFormError(413, `Max content size is ${formatMiB(limit)}`);
  };
}

function pasteName(req: FastifyRequest): string {
  const parsed = paramsSchema.safeParse(req.params);
  if (!parsed.success) throw new PasteError('not_found');
  return parsed.data.name;
}

export async function registerPasteRoutes(app: FastifyInstance, opts: PasteRouteOptions) {
  const { service } = opts;

  const uploadLimits = { bodyLimit: opts.uploadLimitBytes, onRequest: maxContentLength(opts.uploadLimitBytes) };
  const editLimits = { bodyLimit: opts.editLimitBytes, onRequest: maxContentLength(opts.editLimitBytes) };

  // Upload
  app.post('/', uploadLimits, async (req, reply) => {
    const form = readForm(req);
    const data = requirePayload(form);

    const name = await service.upload({
      data,
      name: form.name,
      expiresIn: form.e,
      accessPassword: form.ap,
      editPassword: form.ep,
    });
    return reply.type('text/plain; charset=utf-8').send(name);
  });

  // Read
  app.get('/:name', async (req, reply) => {
    const { ap } = readForm(req);
    const data = await service.retrieve(pasteName(req), ap);
    return reply.type('text/plain; charset=utf-8').send(data);
  });

  // Edit
  app.put('/:name', editLimits, async (req, reply) => {
    const form = readForm(req);
    const data = requirePayload(form);
    await service.edit(pasteName(req), data, form.ep);
    return reply.code(200).send();
  });

  // Delete
  app.delete('/:name', async (req, reply) => {
    const { ep } = readForm(req);
    await service.remove(pasteName(req), ep);
    return reply.code(200).send();
  });
}
