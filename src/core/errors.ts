// ── Load errors ──────────────────────────────────────────────

export type ConfigLoadErrorCode = 'OPEN_FAILED';

export class ConfigLoadError extends Error {
  readonly code: ConfigLoadErrorCode;
  readonly path: string;

  constructor(code: ConfigLoadErrorCode, path: string, options?: { cause?: unknown }) {
    super(`Failed to open config file: ${path}`, options);
    this.name = 'ConfigLoadError';
    this.code = code;
    this.path = path;
  }
}
