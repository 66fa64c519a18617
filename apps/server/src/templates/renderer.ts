import type { FastifyReply } from 'fastify';
import { TemplateBuildError } from '../errors';
import type { LoggerService } from '../services/logger.service';
import type { TemplateCache } from './templateCache';
import type { TemplateLoader } from './templateLoader';
import { emptyTemplateData, type CompiledTemplate, type TemplateData } from './templateData';

export interface RendererOptions {
  /** Serve compiled templates from the cache instead of re-reading disk on every render. */
  useCache: boolean;
}

function buildErrorContext(name: string, err: unknown): { template: string; file?: string } {
  return err instanceof TemplateBuildError && err.file ? { template: name, file: err.file } : { template: name };
}

export class TemplateRenderer {
  constructor(
    private readonly options: RendererOptions,
    private readonly loader: TemplateLoader,
    private readonly cache: TemplateCache,
    private readonly logger: LoggerService,
  ) {}

  async render(reply: FastifyReply, name: string, td?: TemplateData): Promise<void> {
    let tmpl: CompiledTemplate | undefined;

    if (this.options.useCache) {
      tmpl = this.cache.get(name);
    }

    if (!tmpl) {
      try {
        tmpl = await this.buildFromDisk(name);
      } catch (err) {
        this.logger.error('Error building template', buildErrorContext(name, err), err);
        this.sendError(reply, 'Internal Server Error');
        return;
      }
      this.logger.info('building template from disk', { template: name });
    }

    let html: string;
    try {
      html = tmpl.execute(td ?? emptyTemplateData());
    } catch (err) {
      this.logger.error('Error executing template', { template: name, files: tmpl.files }, err);
      this.sendError(reply, err instanceof Error ? err.message : String(err));
      return;
    }

    reply.code(200).type('text/html; charset=utf-8').send(html);
  }

  // Built templates are always stored; `useCache` only decides whether they are read back.
  private async buildFromDisk(name: string): Promise<CompiledTemplate> {
    const tmpl = await this.loader.build(name);
    this.cache.set(name, tmpl);
    return tmpl;
  }

  private sendError(reply: FastifyReply, message: string): void {
    reply
      .code(500)
      .header('x-content-type-options', 'nosniff')
      .type('text/plain; charset=utf-8')
      .send(`${message}\n`);
  }
}
