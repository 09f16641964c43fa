export type RedlinerErrorCode =
  | 'configuration_unavailable'
  | 'download_failed'
  | 'page_selection_failed'
  | 'substitution_render_failure';

export class RedlinerError extends Error {
  readonly code: RedlinerErrorCode;

  constructor(code: RedlinerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or malformed local configuration file. Fatal at startup. */
export class ConfigurationUnavailableError extends RedlinerError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('configuration_unavailable', message, options);
    this.path = path;
  }
}

export class DownloadFailedError extends RedlinerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('download_failed', message, options);
  }
}

export class PageSelectionFailedError extends RedlinerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('page_selection_failed', message, options);
  }
}

/** The PDF layer failed while loading, searching, redacting, drawing or saving. */
export class SubstitutionRenderFailureError extends RedlinerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('substitution_render_failure', message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
