/**
 * Run-level error types. Per-URL failures are not exceptions; they travel as
 * `FetchFailure` values (see fetch/types.ts) and end up in the bundle.
 */

/** Invalid run input (configuration or seed URLs), raised before any fetch. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** One export format could not be written. Caught per format by the exporter. */
export class ExportError extends Error {
  readonly format: string;

  constructor(format: string, message: string, options?: { cause?: unknown }) {
    super(`Export to ${format} failed: ${message}`, options);
    this.name = 'ExportError';
    this.format = format;
  }
}
