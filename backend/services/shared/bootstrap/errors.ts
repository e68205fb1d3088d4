// backend/services/shared/bootstrap/errors.ts

/**
 * Startup failures. Every one of them is fatal: the CLI logs it once and
 * exits with `exitCode`. There is no retry at this layer.
 */

export type BootstrapErrorCode =
  | "INVALID_LAUNCH_CONFIG"
  | "TLS_FILE_ERROR"
  | "APP_NOT_FOUND"
  | "MODULE_NOT_FOUND"
  | "ADDRESS_IN_USE"
  | "ADDRESS_NOT_AVAILABLE"
  | "PERMISSION_DENIED"
  | "LISTEN_FAILED";

export class BootstrapError extends Error {
  public readonly exitCode = 1;

  constructor(
    public readonly code: BootstrapErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidLaunchConfigError extends BootstrapError {
  constructor(public readonly issues: string[]) {
    super(
      "INVALID_LAUNCH_CONFIG",
      `Invalid launch configuration: ${issues.join("; ")}`
    );
  }
}

export class TlsFileError extends BootstrapError {
  constructor(
    public readonly role: "key" | "certificate" | "pair",
    public readonly filePath: string,
    reason: string,
    cause?: unknown
  ) {
    super(
      "TLS_FILE_ERROR",
      `TLS ${role === "pair" ? "key/certificate pair" : `${role} file`} ${filePath}: ${reason}`,
      { cause }
    );
  }
}

export class AppNotFoundError extends BootstrapError {
  constructor(public readonly spec: string, reason: string) {
    super("APP_NOT_FOUND", `Could not load application "${spec}": ${reason}`);
  }
}

export class ModuleNotFoundError extends BootstrapError {
  constructor(public readonly modulePath: string) {
    super("MODULE_NOT_FOUND", `No module named '${modulePath}'`);
  }
}

export class AddressInUseError extends BootstrapError {
  constructor(host: string, port: number, cause?: unknown) {
    super("ADDRESS_IN_USE", `Address already in use: ${host}:${port}`, {
      cause,
    });
  }
}

export class AddressNotAvailableError extends BootstrapError {
  constructor(host: string, port: number, cause?: unknown) {
    super(
      "ADDRESS_NOT_AVAILABLE",
      `Cannot bind ${host}:${port}: address not available`,
      { cause }
    );
  }
}

export class PermissionDeniedError extends BootstrapError {
  constructor(host: string, port: number, cause?: unknown) {
    super("PERMISSION_DENIED", `Permission denied binding ${host}:${port}`, {
      cause,
    });
  }
}

/** Map a listen() error onto the taxonomy above. */
export function fromListenError(
  err: NodeJS.ErrnoException,
  host: string,
  port: number
): BootstrapError {
  switch (err.code) {
    case "EADDRINUSE":
      return new AddressInUseError(host, port, err);
    case "EADDRNOTAVAIL":
    case "ENOTFOUND":
      return new AddressNotAvailableError(host, port, err);
    case "EACCES":
      return new PermissionDeniedError(host, port, err);
    default:
      return new BootstrapError(
        "LISTEN_FAILED",
        `Failed to listen on ${host}:${port}: ${err.message}`,
        { cause: err }
      );
  }
}
