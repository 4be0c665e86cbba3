/** Invalid or missing configuration, raised before any request is made. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Transport or HTTP failure talking to the management API. */
export class ApiError extends Error {
  override name = "ApiError";

  constructor(
    message: string,
    readonly method: string,
    readonly path: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** A fatal step of a reconciliation; aborts the item it belongs to. */
export class ReconcileError extends Error {
  override name = "ReconcileError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a required read or a write, turning any failure into a ReconcileError
 * with the "Failed to <operation>" prefix.
 */
export async function attempt<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ReconcileError) throw error;
    throw new ReconcileError(`Failed to ${operation}. Error: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
