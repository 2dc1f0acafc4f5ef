import type { ZodError } from 'zod';

/** Caller payload failed validation. Raised before any stage runs; nothing is persisted. */
export class InvalidRequestError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }

  static fromZod(pipeline: string, error: ZodError): InvalidRequestError {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return new InvalidRequestError(`Invalid ${pipeline} request`, issues);
  }
}

/** A stage threw instead of returning a patch. Nothing is persisted for the run. */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'PipelineError';
  }
}

/** Environment could not be parsed into settings */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
