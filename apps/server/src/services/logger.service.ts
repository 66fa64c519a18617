// src/services/logger.service.ts

type Level = 'INFO' | 'DEBUG' | 'WARN' | 'ERROR';

const REDACT_KEYS = /token|api[_-]?key|authorization|password|secret/i;

export class LoggerService {
  info(message: string, ...optionalParams: unknown[]) {
    console.info(this.format('INFO', message, optionalParams));
  }

  debug(message: string, ...optionalParams: unknown[]) {
    console.debug(this.format('DEBUG', message, optionalParams));
  }

  warn(message: string, ...optionalParams: unknown[]) {
    console.warn(this.format('WARN', message, optionalParams));
  }

  error(message: string, ...optionalParams: unknown[]) {
    console.error(this.format('ERROR', message, optionalParams));
  }

  private format(level: Level, message: string, params: unknown[]): string {
    const line = `[${level}] ${message}`;
    return params.length ? `${line} ${this.serialize(params)}` : line;
  }

  private serialize(params: unknown[]): string {
    const seen = new WeakSet<object>();
    try {
      return JSON.stringify(params.map((p) => toLoggable(p, seen)));
    } catch {
      try { return String(params); } catch { return '[unserializable]'; }
    }
  }
}

// Template and fs errors carry `code` (template_not_found, ENOENT) and a file;
// causes are followed so a failed build shows what the filesystem reported.
function errorToLoggable(err: Error, seen: WeakSet<object>): Record<string, unknown> {
  seen.add(err);
  const out: Record<string, unknown> = { name: err.name, message: err.message };
  if ('code' in err && typeof err.code === 'string') out.code = err.code;
  if ('file' in err && typeof err.file === 'string') out.file = err.file;
  out.stack = err.stack;
  if (err.cause !== undefined) out.cause = toLoggable(err.cause, seen);
  return out;
}

function toLoggable(v: unknown, seen: WeakSet<object>): unknown {
  if (!v || typeof v !== 'object') return v;
  if (seen.has(v)) return '[Circular]';
  if (v instanceof Error) return errorToLoggable(v, seen);
  seen.add(v);
  if (Array.isArray(v)) return v.map((item) => toLoggable(item, seen));
  const out: Record<string, unknown> = {};
  for (const [k, val] of Object.entries(v)) {
    out[k] = REDACT_KEYS.test(k) ? '[REDACTED]' : toLoggable(val, seen);
  }
  return out;
}
