/**
 * wikiladder error hierarchy
 */

export class WikiLadderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'WikiLadderError';
  }
}

// --- Config ---

export class ConfigError extends WikiLadderError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'wikiladder init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

/**
 * Search limits that can never produce an anchored ladder, or that are not
 * positive. Raised when an engine is constructed.
 */
export class InvalidSearchConfigError extends WikiLadderError {
  constructor(message: string) {
    super(message, 'INVALID_SEARCH_CONFIG');
    this.name = 'InvalidSearchConfigError';
  }
}

// --- Transport ---

export class TransportError extends WikiLadderError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

// --- Database ---

export class DatabaseError extends WikiLadderError {
  constructor(message: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', cause);
    this.name = 'DatabaseError';
  }
}

export class MigrationError extends DatabaseError {
  constructor(version: number, cause?: Error) {
    super(`Migration to version ${version} failed`, cause);
    this.name = 'MigrationError';
  }
}

// --- Title ---

export class InvalidTitleError extends WikiLadderError {
  constructor(title: string, reason: string) {
    super(`Invalid title "${title}": ${reason}`, 'INVALID_TITLE');
    this.name = 'InvalidTitleError';
  }
}

// --- Input ---

export class InvalidInputError extends WikiLadderError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

// --- Ladder ---

export class LadderError extends WikiLadderError {
  constructor(message: string) {
    super(message, 'LADDER_ERROR');
    this.name = 'LadderError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
