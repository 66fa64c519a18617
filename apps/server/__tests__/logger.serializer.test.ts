import { afterEach, describe, it, expect, vi } from 'vitest';
import { LoggerService } from '../src/services/logger.service';
import { TemplateNotFoundError } from '../src/errors';

const logger = new LoggerService();
const serialize = (params: unknown[]) => JSON.parse(logger['serialize'](params));

describe('LoggerService.serialize', () => {
  it('expands Error objects', () => {
    const parsed = serialize([new Error('boom')])[0];
    expect(parsed.name).toBe('Error');
    expect(parsed.message).toBe('boom');
    expect(typeof parsed.stack).toBe('string');
  });

  it('handles circular refs and redacts secrets', () => {
    const o: Record<string, unknown> = { accessToken: 'test-secret', nested: { password: 'pw' }, template: 'home.page.hbs' };
    o.self = o;
    const parsed = serialize([o])[0];
    expect(parsed.accessToken).toBe('[REDACTED]');
    expect(parsed.nested.password).toBe('[REDACTED]');
    expect(parsed.template).toBe('home.page.hbs');
    expect(parsed.self).toBe('[Circular]');
  });

  it('includes error cause if present', () => {
    const err = new Error('outer', { cause: new Error('root') });
    const parsed = serialize([err])[0];
    expect(parsed.cause.name).toBe('Error');
    expect(parsed.cause.message).toBe('root');
  });
});

describe('LoggerService.serialize template errors', () => {
  it('keeps code and file and follows the filesystem cause', () => {
    const enoent = Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
    const parsed = serialize([new TemplateNotFoundError('home.page.hbs', { cause: enoent })])[0];
    expect(parsed.name).toBe('TemplateNotFoundError');
    expect(parsed.code).toBe('template_not_found');
    expect(parsed.file).toBe('home.page.hbs');
    expect(parsed.message).toBe('template file not found: home.page.hbs');
    expect(parsed.cause.code).toBe('ENOENT');
    expect(parsed.cause.cause).toBeUndefined();
  });

  it('marks an error repeated in the same payload as circular', () => {
    const err = new Error('once');
    const parsed = serialize([{ err }, err]);
    expect(parsed[0].err.message).toBe('once');
    expect(parsed[1]).toBe('[Circular]');
  });
});

describe('LoggerService output', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes the level and omits the payload when there are no params', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
    logger.info('building template from disk');
    expect(spy).toHaveBeenCalledWith('[INFO] building template from disk');
  });

  it('appends serialized params', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.error('Error building template', { template: 'home.page.hbs' });
    expect(spy).toHaveBeenCalledWith('[ERROR] Error building template [{"template":"home.page.hbs"}]');
  });
});
