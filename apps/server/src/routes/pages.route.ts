import type { FastifyInstance } from 'fastify';
import type { TemplateRenderer } from '../templates/renderer';

export const HOME_PAGE = 'home.page.hbs';
export const ABOUT_PAGE = 'about.page.hbs';

export function registerPageRoutes(fastify: FastifyInstance, renderer: TemplateRenderer) {
  fastify.get('/', async (_req, reply) => {
    await renderer.render(reply, HOME_PAGE);
    return reply;
  });

  fastify.get('/about', async (_req, reply) => {
    await renderer.render(reply, ABOUT_PAGE, {
      data: {
        title: 'About',
        facts: ['Pages are built from a base layout, a header, a footer and a page template.', 'Compiled templates are cached in memory when caching is enabled.'],
      },
    });
    return reply;
  });
}
