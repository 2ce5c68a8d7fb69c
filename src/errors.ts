// Error kinds raised by the knowledge store

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * The data source could not produce rows (error or timeout) and there was no
 * snapshot to fall back to, or an explicit refresh failed.
 */
export class DataSourceUnavailable extends Error {
  readonly source: string;

  constructor(source: string, cause?: unknown) {
    super(
      cause === undefined
        ? `Knowledge source unavailable: ${source}`
        : `Knowledge source unavailable: ${source} (${describeCause(cause)})`,
      { cause }
    );
    this.name = "DataSourceUnavailable";
    this.source = source;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
