/** Base class for every failure the tool reports on its own terms */
export class DeadrunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A source file did not parse. Fatal for the whole extraction. */
export class SourceParseError extends DeadrunError {
  constructor(
    readonly filePath: string,
    readonly diagnostics: string[]
  ) {
    super(`Failed to parse ${filePath}:\n${diagnostics.map(d => `  ${d}`).join('\n')}`);
  }
}

/** Orphan analysis was requested before any script was traced */
export class EmptyTraceCacheError extends DeadrunError {
  constructor() {
    super('Trace cache is currently empty. Use "deadrun record" first.');
  }
}

/** A stored trace artifact or catalog does not have the expected shape */
export class TraceFormatError extends DeadrunError {
  constructor(
    readonly filePath: string,
    detail: string
  ) {
    super(`Malformed trace data in ${filePath}: ${detail}`);
  }
}

/** Invalid configuration value */
export class ConfigError extends DeadrunError {}
