/* ── error classes ───────────────────────────────────────── */

/** Malformed persisted bytes. Never recovered from: merges assume well-formed slices. */
export class DecodeError extends Error {
  readonly path: string;
  readonly detail: string;

  constructor(path: string, detail: string, options?: ErrorOptions) {
    const target = path === "" ? "<root>" : path;
    super(`decode failed at ${target}: ${detail}`, options);
    this.name = "DecodeError";
    this.path = path;
    this.detail = detail;
  }
}

export class SubstrateError extends Error {
  readonly ref: string;

  constructor(ref: string, detail: string, options?: ErrorOptions) {
    super(`substrate ${ref}: ${detail}`, options);
    this.name = "SubstrateError";
    this.ref = ref;
  }
}

/** A lattice could not be derived for the requested shape. */
export class DerivationError extends TypeError {
  constructor(detail: string) {
    super(`cannot derive semilattice: ${detail}`);
    this.name = "DerivationError";
  }
}

export type SessionErrorReason = "device-range" | "unknown-message";

export class SessionError extends Error {
  readonly reason: SessionErrorReason;

  constructor(reason: SessionErrorReason, message: string) {
    super(message);
    this.name = "SessionError";
    this.reason = reason;
  }
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Prefixes the path of a nested DecodeError; anything else passes through. */
export const withDecodePath = <T>(segment: string, fn: () => T): T => {
  try {
    return fn();
  } catch (err) {
    if (err instanceof DecodeError) {
      const path = err.path === "" ? segment : `${segment}.${err.path}`;
      throw new DecodeError(path, err.detail, { cause: err.cause });
    }
    throw err;
  }
};
