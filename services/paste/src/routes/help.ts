import { readFile } from 'node:fs/promises';
import type { FastifyInstance } from 'fastify';
import { marked } from 'marked';

/** Serves the service README, rendered to HTML, at `/`. Read on every request. */
export async function registerHelpRoutes(app: FastifyInstance, opts: { helpPath: string }) {
  app.get('/', async (_req, reply) => {
    const markdown = await readFile(opts.helpPath, 'utf8');
    const html = await marked.parse(markdown);
    return reply.type('text/html; charset=utf-8').send(html);
  });
}
