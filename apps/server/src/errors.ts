export class ConfigError extends Error {
  readonly code = 'config_invalid';

  constructor(
    message: string,
    readonly keys: string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** `file` is relative to the templates directory, when one file is to blame. */
export class TemplateBuildError extends Error {
  readonly code: string = 'template_build_failed';

  constructor(
    message: string,
    readonly file?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TemplateBuildError';
  }
}

export class TemplateNotFoundError extends TemplateBuildError {
  override readonly code: string = 'template_not_found';

  constructor(file: string, options?: { cause?: unknown }) {
    super(`template file not found: ${file}`, file, options);
    this.name = 'TemplateNotFoundError';
  }
}
