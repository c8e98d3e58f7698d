/**
 * Wire-level errors raised by the HTTP adapters.
 */

export interface TextMagicErrorBody {
  message: string;
  code: number;
  errors?: {
    common?: string[];
    fields?: Record<string, string[]>;
  } | null;
}

/** 404 from TextMagic. For contact lookups this means "no such contact". */
export class TextMagicNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`TextMagic: not found (${path})`);
    this.name = 'TextMagicNotFoundError';
  }
}

export class TextMagicAuthError extends Error {
  constructor() {
    super('TextMagic: auth failed');
    this.name = 'TextMagicAuthError';
  }
}

/**
 * Any other non-success response. The message flattens the body's common
 * and per-field errors, e.g.
 *   "Validation Failed (400): phone: is not valid, email: is not valid"
 */
export class TextMagicApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: TextMagicErrorBody,
  ) {
    super(formatTextMagicError(body));
    this.name = 'TextMagicApiError';
  }
}

export function formatTextMagicError(body: TextMagicErrorBody): string {
  let text = `${body.message} (${body.code})`;
  const common = body.errors?.common;
  const fields = body.errors?.fields;

  const details: string[] = [];
  if (common && common.length > 0) details.push(common.join(', '));
  if (fields) {
    for (const [field, messages] of Object.entries(fields)) {
      details.push(`${field}: ${messages.join(', ')}`);
    }
  }
  if (details.length > 0) text += `: ${details.join(', ')}`;
  return text;
}

export class UplistingApiError extends Error {
  constructor(
    readonly status: number,
    readonly path: string,
    readonly responseText: string,
  ) {
    super(`Uplisting ${path} returned ${status}: ${responseText.slice(0, 500)}`);
    this.name = 'UplistingApiError';
  }
}
