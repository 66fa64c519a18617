import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../errors';

// apps/server/src/config -> apps/server/templates
export const DEFAULT_TEMPLATES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'templates');

const TRUTHY = new Set(['1', 'true', 'yes']);

export const AppConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  host: z.string().min(1),
  useCache: z.boolean(),
  templatesDir: z.string().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

function asString(v: string | undefined): string | undefined {
  const trimmed = v?.trim();
  return trimmed ? trimmed : undefined;
}

function parseFlag(v: string | undefined, fallback: boolean): boolean {
  const s = asString(v);
  if (s === undefined) return fallback;
  return TRUTHY.has(s.toLowerCase());
}

export function buildAppConfigFromEnv(env: Env = process.env): AppConfig {
  const production = env.NODE_ENV === 'production';
  const templatesDir = asString(env.TEMPLATES_DIR);

  const parsed = AppConfigSchema.safeParse({
    port: asString(env.PORT) ?? 4000,
    host: asString(env.HOST) ?? '0.0.0.0',
    useCache: parseFlag(env.TEMPLATE_CACHE, production),
    templatesDir: templatesDir ? resolve(templatesDir) : DEFAULT_TEMPLATES_DIR,
  });
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => i.path.join('.')))];
    throw new ConfigError(`invalid configuration: ${keys.join(', ')}`, keys, { cause: parsed.error });
  }
  return parsed.data;
}
