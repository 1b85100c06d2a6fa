export type LinkErrorCode =
  | "radio-disabled"
  | "permission-denied"
  | "discovery-failed"
  | "connection-refused"
  | "connect-timeout"
  | "transport-error"
  | "stream-error"
  | "connection-lost"
  | "resource-init-failed"
  | "audio-device-error"
  | "invalid-state";

const MESSAGES: Record<LinkErrorCode, string> = {
  "radio-disabled": "Radio must be enabled",
  "permission-denied": "Permission required",
  "discovery-failed": "Discovery failed",
  "connection-refused": "Connection refused",
  "connect-timeout": "Connection timed out",
  "transport-error": "Transport error",
  "stream-error": "Connection lost (stream error)",
  "connection-lost": "Connection lost",
  "resource-init-failed": "Audio device unavailable",
  "audio-device-error": "Audio device failed",
  "invalid-state": "Not allowed right now",
};

/**
 * Error carrying a named failure condition. The code drives the status text
 * shown to the user, so two different failures never collapse into a
 * generic "error".
 */
export class LinkError extends Error {
  readonly code: LinkErrorCode;
  /** Platform-specific detail, e.g. a socket errno or a scan failure code */
  readonly detail?: string;

  constructor(
    code: LinkErrorCode,
    message?: string,
    options?: { detail?: string; cause?: unknown },
  ) {
    super(message ?? MESSAGES[code], { cause: options?.cause });
    this.name = "LinkError";
    this.code = code;
    this.detail = options?.detail;
  }
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** User-facing text for a failure condition */
export function describeLinkError(error: LinkError): string {
  const base = MESSAGES[error.code];
  return error.detail ? `${base} (${error.detail})` : base;
}

export function isLinkError(value: unknown): value is LinkError {
  return value instanceof LinkError;
}

/**
 * Wraps anything thrown by a platform call into a LinkError of the given
 * code, keeping existing LinkErrors as they are.
 */
export function toLinkError(value: unknown, code: LinkErrorCode): LinkError {
  if (value instanceof LinkError) return value;
  const detail = errorDetail(value);
  return new LinkError(code, undefined, { detail, cause: value });
}

function errorDetail(value: unknown): string | undefined {
  if (value instanceof Error) {
    if ("code" in value && typeof value.code === "string") return value.code;
    return value.message;
  }
  if (typeof value === "string") return value;
  return undefined;
}
