/**
 * Base class for failures that stop a run (as opposed to per-domain failures,
 * which are recorded on the domain's result)
 */
export class DomainCheckerError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends DomainCheckerError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

export class SourceListError extends DomainCheckerError {
  constructor(message: string) {
    super(message, 'SOURCE_LIST_ERROR');
  }
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
