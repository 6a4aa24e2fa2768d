/**
 * Error types surfaced by the reporter. Everything the CLI prints as a fatal
 * error is a ReporterError; anything else is unexpected.
 */

export class ReporterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One or more environment variables were missing or malformed. Messages are
 * collected for every offending variable so the user can fix them in one go.
 */
export class EnvValidationError extends ReporterError {
  readonly problems: readonly string[];

  constructor(problems: string[]) {
    super(`env: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export class MalformedURLError extends ReporterError {
  constructor(public readonly url: string) {
    super(`unable to extract repository name-with-owner from URL: ${url}`);
  }
}

export class RepositoryNotFoundError extends ReporterError {
  constructor(public readonly path: string, options?: ErrorOptions) {
    super(`no repository found at ${path}`, options);
  }
}

export class CommitNotFoundError extends ReporterError {
  constructor(public readonly sha: string, cause: unknown) {
    super(`unable to find commit with SHA \`${sha}\`: ${describeError(cause)}`, { cause });
  }
}

export class SerializationError extends ReporterError {}

/** Invalid command-line usage */
export class ArgumentError extends ReporterError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
