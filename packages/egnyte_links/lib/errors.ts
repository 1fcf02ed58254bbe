export class InvalidArgumentError extends Error {
  readonly argument: string;

  constructor(argument: string, message = `${argument} is required`) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

/**
 * Raised by the fetch transport when Egnyte answers with a non-success status
 * or a body that cannot be read as JSON.
 */
export class EgnyteRequestError extends Error {
  readonly status: number | null;
  readonly url: string;

  constructor(
    message: string,
    { status, url, cause }: { status: number | null; url: string; cause?: unknown }
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "EgnyteRequestError";
    this.status = status;
    this.url = url;
  }
}
