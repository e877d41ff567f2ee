/**
 * Error taxonomy for a config generation run.
 *
 * - ConfigError: run configuration missing or invalid. Fatal before any output.
 * - TransportError: the DNS-management system could not be queried. Fatal for the run.
 * - NamingError: a zone name cannot be turned into a domain name. The zone is skipped.
 * - UnsupportedFormatError: a nameserver asks for an unknown dialect. Fatal for that nameserver.
 */
export class NsConfError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends NsConfError {
  constructor(
    message: string,
    readonly source?: string,
    options?: { cause?: unknown }
  ) {
    super(source ? `${source}: ${message}` : message, options);
  }
}

export class TransportError extends NsConfError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NamingError extends NsConfError {
  constructor(
    readonly zoneName: string,
    reason: string
  ) {
    super(`Cannot derive domain name for zone "${zoneName}": ${reason}`);
  }
}

export class UnsupportedFormatError extends NsConfError {
  constructor(readonly format: string) {
    super(`Unknown configuration format: ${format}`);
  }
}

/**
 * Fatal errors abort the whole run; everything else is scoped to a zone or nameserver.
 */
export function isFatalError(error: unknown): error is ConfigError | TransportError {
  return error instanceof ConfigError || error instanceof TransportError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
