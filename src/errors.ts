/** Base class for every error the core throws on purpose. */
export class DasherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Bad settings, an unusable alphabet, or a malformed data file.  Raised
 * before a session runs, never from inside a frame.
 */
export class ConfigurationError extends DasherError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** A coordinate-frame invariant was found broken after a step. */
export class InvariantError extends DasherError {}
