import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export const BASE = '<main>{{> header}}{{> content}}{{> footer}}</main>';
export const HEADER = '<h1>{{data.title}}</h1>';
export const FOOTER = '<p>footer</p>';

export type TemplateFiles = Record<string, string>;

export async function makeTemplatesDir(pages: TemplateFiles, layout: TemplateFiles = {}): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'pageforge-templates-'));
  const files: TemplateFiles = {
    'base.layout.hbs': BASE,
    'partials/header.partial.hbs': HEADER,
    'partials/footer.partial.hbs': FOOTER,
    ...layout,
    ...pages,
  };
  for (const [name, content] of Object.entries(files)) {
    await writeTemplate(dir, name, content);
  }
  return dir;
}

export async function writeTemplate(dir: string, name: string, content: string): Promise<void> {
  const file = join(dir, name);
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, content, 'utf8');
}

export async function removeTemplatesDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
