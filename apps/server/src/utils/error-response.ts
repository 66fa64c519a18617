export interface ErrorResponse {
  code: string;
  message: string;
  retriable: boolean;
}

export interface HttpErrorResponse {
  statusCode: number;
  body: ErrorResponse;
}

const DEFAULT_ERROR_CODE = 'unknown_error';

type ErrorLike = { code?: unknown; message?: unknown; retriable?: unknown; statusCode?: unknown };

const asErrorLike = (input: unknown): ErrorLike | undefined =>
  typeof input === 'object' && input !== null ? (input as ErrorLike) : undefined;

export const normalizeError = (
  input: unknown,
  options?: { defaultCode?: string; retriable?: boolean },
): ErrorResponse => {
  const defaultCode = options?.defaultCode ?? DEFAULT_ERROR_CODE;
  const defaultRetriable = options?.retriable ?? false;

  if (typeof input === 'string') {
    return { code: defaultCode, message: input, retriable: defaultRetriable };
  }

  const candidate = asErrorLike(input);
  if (!candidate) {
    return { code: defaultCode, message: String(input), retriable: defaultRetriable };
  }

  // Own errors and Fastify's carry a string `code`; plain Errors fall back to their name.
  let code = defaultCode;
  if (typeof candidate.code === 'string' && candidate.code.length) code = candidate.code;
  else if (input instanceof Error && input.name !== 'Error') code = input.name;

  const message = typeof candidate.message === 'string' && candidate.message.length ? candidate.message : code;
  const retriable = typeof candidate.retriable === 'boolean' ? candidate.retriable : defaultRetriable;
  return { code, message, retriable };
};

export const statusCodeOf = (input: unknown): number => {
  const code = asErrorLike(input)?.statusCode;
  return typeof code === 'number' && code >= 400 && code < 600 ? code : 500;
};

export const toHttpError = (input: unknown, options?: { defaultCode?: string }): HttpErrorResponse => {
  const statusCode = statusCodeOf(input);
  return {
    statusCode,
    body: normalizeError(input, { defaultCode: options?.defaultCode, retriable: statusCode === 503 }),
  };
};
