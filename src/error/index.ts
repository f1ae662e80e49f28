/**
 * Storage Error Types
 *
 * Error hierarchy for the Cloud Storage XML client, plus the `Result` type
 * returned by client operations.
 */

import type { ZodError } from "zod";

/**
 * Base storage error class.
 */
export class StorageError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, options?: { retryable?: boolean }) {
    super(message);
    this.name = "StorageError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, StorageError.prototype);
  }

  /**
   * HTTP status code if applicable.
   */
  get statusCode(): number | undefined {
    return undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.statusCode,
      retryable: this.retryable,
    };
  }
}

/**
 * Bucket naming sub-rules, in the order they are checked.
 */
export type BucketNameRule = "characters" | "start" | "end" | "length";

/**
 * Local precondition failure. Never reaches the network.
 */
export class ValidationError extends StorageError {
  public readonly rule: BucketNameRule;
  public readonly value: string;

  constructor(message: string, rule: BucketNameRule, value: string) {
    super(message, `Validation.${rule}`);
    this.name = "ValidationError";
    this.rule = rule;
    this.value = value;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Remote rejection (status >= 300) or an unresolvable service host.
 */
export class ServiceError extends StorageError {
  public readonly status: number;
  public readonly reason: string;

  constructor(status: number, reason: string) {
    super(`${status}: ${reason}`, `Service.HTTP_${status}`, {
      retryable: status >= 500 || status === 429,
    });
    this.name = "ServiceError";
    this.status = status;
    this.reason = reason;
    Object.setPrototypeOf(this, ServiceError.prototype);
  }

  override get statusCode(): number {
    return this.status;
  }
}

/**
 * Network/transport error.
 */
export class NetworkError extends StorageError {
  constructor(
    message: string,
    code: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed",
    options?: { cause?: unknown }
  ) {
    super(message, `Network.${code}`, { retryable: code !== "DnsResolutionFailed" });
    this.name = "NetworkError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  get isDnsFailure(): boolean {
    return this.code === "Network.DnsResolutionFailed";
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends StorageError {
  public readonly issues?: ZodError;

  constructor(
    message: string,
    code: "MissingProject" | "InvalidCredentials" | "InvalidConfig" = "InvalidConfig",
    issues?: ZodError
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Authentication error.
 */
export class AuthenticationError extends StorageError {
  private readonly _statusCode?: number;

  constructor(
    message: string,
    code: "TokenRefreshFailed" | "InvalidCredentials" = "InvalidCredentials",
    options?: { statusCode?: number }
  ) {
    super(message, `Authentication.${code}`);
    this.name = "AuthenticationError";
    this._statusCode = options?.statusCode;
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  override get statusCode(): number | undefined {
    return this._statusCode;
  }
}

/**
 * Synthetic error for a service host that cannot be resolved.
 */
export function serverNotFound(): ServiceError {
  return new ServiceError(404, "Server not found.");
}

/**
 * Type guard for StorageError.
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type for operation results.
 */
export type Result<T, E = StorageError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Errors a client operation reports through its result.
 */
export type OperationError = ValidationError | ServiceError;

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Return the data of a successful result or throw its error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw result.error;
}
