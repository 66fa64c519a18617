import { readFile, realpath } from 'node:fs/promises';
import { basename, isAbsolute, relative, resolve, sep } from 'node:path';
import Handlebars from 'handlebars';
import { TemplateBuildError, TemplateNotFoundError } from '../errors';
import type { CompiledTemplate, TemplateData } from './templateData';

// Parse order matters: layout first, shared partials next, the page last.
export const LAYOUT_FILES = [
  'base.layout.hbs',
  'partials/header.partial.hbs',
  'partials/footer.partial.hbs',
] as const;

export type TemplateHelpers = Record<string, Handlebars.HelperDelegate>;

export interface TemplateLoaderOptions {
  templatesDir: string;
  helpers?: TemplateHelpers;
}

/** `partials/header.partial.hbs` is registered as the `header` partial. */
export function partialName(file: string): string {
  return basename(file).split('.')[0];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR' || err.code === 'ENOTDIR');
}

function isOutside(root: string, file: string): boolean {
  const rel = relative(root, file);
  return !rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

export class TemplateLoader {
  private readonly templatesDir: string;

  constructor(private readonly options: TemplateLoaderOptions) {
    this.templatesDir = resolve(options.templatesDir);
  }

  /** Absolute paths of the files a page is built from, in parse order. */
  files(name: string): string[] {
    return [...LAYOUT_FILES.map((f) => resolve(this.templatesDir, f)), this.resolvePage(name)];
  }

  async build(name: string): Promise<CompiledTemplate> {
    const files = this.files(name);
    const pageFile = files[files.length - 1];
    await this.assertInsideTemplatesDir(pageFile);
    const sources = await Promise.all(files.map((file) => this.read(file)));

    // Each page gets its own environment so partials never leak between pages.
    const env = Handlebars.create();
    if (this.options.helpers) env.registerHelper(this.options.helpers);

    for (let i = 0; i < files.length - 1; i++) {
      env.registerPartial(partialName(files[i]), env.compile(this.check(env, files[i], sources[i])));
    }
    const page = env.compile<TemplateData>(this.check(env, pageFile, sources[sources.length - 1]));

    return {
      name,
      files,
      execute: (td) => page(td),
    };
  }

  private resolvePage(name: string): string {
    const file = resolve(this.templatesDir, name);
    if (!name || isOutside(this.templatesDir, file)) throw new TemplateNotFoundError(name);
    return file;
  }

  // The lexical check in resolvePage does not see symlinks; compare real paths as well.
  private async assertInsideTemplatesDir(file: string): Promise<void> {
    const rel = relative(this.templatesDir, file);
    let root: string;
    let real: string;
    try {
      [root, real] = await Promise.all([realpath(this.templatesDir), realpath(file)]);
    } catch (err) {
      if (isMissingFile(err)) throw new TemplateNotFoundError(rel, { cause: err });
      throw new TemplateBuildError(`failed to resolve ${rel}`, rel, { cause: err });
    }
    if (isOutside(root, real)) throw new TemplateNotFoundError(rel);
  }

  private async read(file: string): Promise<string> {
    const rel = relative(this.templatesDir, file);
    try {
      return await readFile(file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) throw new TemplateNotFoundError(rel, { cause: err });
      throw new TemplateBuildError(`failed to read ${rel}`, rel, { cause: err });
    }
  }

  // compile() defers both parsing and code generation to the first call.
  // precompile() runs them now, so any template error fails the build.
  private check(env: typeof Handlebars, file: string, source: string): string {
    const rel = relative(this.templatesDir, file);
    try {
      env.precompile(source);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TemplateBuildError(`failed to parse ${rel}: ${reason}`, rel, { cause: err });
    }
    return source;
  }
}
