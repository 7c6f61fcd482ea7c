export type ErrorKind =
  | "transport"
  | "auth"
  | "protocol"
  | "not-found"
  | "conflict"
  | "precondition"
  | "user"
  | "end-of-stream"
  | "engine";

/**
 * Base error for every failure the dashboard surfaces. The message is what
 * ends up in the banner, so it is kept free of stack noise.
 */
export class DashError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind = "engine",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DashError";
  }
}

/** Dial, handshake, forward or connection failures. */
export class TransportError extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "transport", options);
    this.name = "TransportError";
  }
}

/** Unreadable or unparsable identity file. */
export class AuthError extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "auth", options);
    this.name = "AuthError";
  }
}

/** The daemon answered with something we cannot decode. */
export class ProtocolError extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "protocol", options);
    this.name = "ProtocolError";
  }
}

export class NotFoundError extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "not-found", options);
    this.name = "NotFoundError";
  }
}

/** Resource in use, or the requested state change conflicts with the current one. */
export class ConflictError extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "conflict", options);
    this.name = "ConflictError";
  }
}

/** An operation that needs a running container was asked of a stopped one. */
export class PreconditionError extends DashError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/** Bad configuration or flag values. */
export class UserError extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "user", options);
    this.name = "UserError";
  }
}

/** Normal end of a session stream. */
export class EndOfStreamError extends DashError {
  constructor() {
    super("EOF", "end-of-stream");
    this.name = "EndOfStreamError";
  }
}

const TRANSPORT_CODES = new Set(["ECONNREFUSED", "ENOENT", "ETIMEDOUT", "EHOSTUNREACH", "ECONNRESET", "EPIPE"]);

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function numberField(err: unknown, field: string): number | undefined {
  if (typeof err !== "object" || err === null || !(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "number" ? value : undefined;
}

function stringField(err: unknown, field: string): string | undefined {
  if (typeof err !== "object" || err === null || !(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Prefer the daemon's own message (`{"message": ...}` body) over the
 * "(HTTP code 404) ..." wrapper docker-modem builds around it.
 */
function daemonMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "json" in err) {
    const message = stringField(Reflect.get(err, "json"), "message");
    if (message) return message;
  }
  return errorMessage(err);
}

/** Map a dockerode failure onto the error taxonomy, prefixed with the operation label. */
export function classifyDockerError(err: unknown, label: string): DashError {
  if (err instanceof DashError) return err;

  const message = `${label}: ${daemonMessage(err)}`;
  const status = numberField(err, "statusCode");
  if (status === 404) return new NotFoundError(message, { cause: err });
  if (status === 409) return new ConflictError(message, { cause: err });

  const code = stringField(err, "code");
  if (code && TRANSPORT_CODES.has(code)) return new TransportError(message, { cause: err });

  return new DashError(message, "engine", { cause: err });
}
