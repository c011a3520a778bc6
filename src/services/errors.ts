export type RemoteDataErrorKind = "transport" | "protocol" | "configuration";

/**
 * Every failure a remote call can produce. All kinds take the same retry
 * path in a poller; the kind only changes the message shown to operators.
 */
export class RemoteDataError extends Error {
  readonly kind: RemoteDataErrorKind;
  readonly url?: string;

  constructor(
    message: string,
    options: { kind: RemoteDataErrorKind; url?: string; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "RemoteDataError";
    this.kind = options.kind;
    this.url = options.url;
  }
}
