/**
 * Cronus — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Enables specific recovery strategies and better observability
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, isRecoverable } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10008) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 * The `kind` field is the discriminator; switch on it instead of instanceof.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/** Database errors (SQLite) */
export interface DbError extends AppError {
  kind: "db_error";
  code: string; // SQLITE_CONSTRAINT, SQLITE_BUSY, SQLITE_CORRUPT, etc.
}

/**
 * Discord API errors.
 *
 * Discord uses numeric codes (not HTTP status) for specific errors:
 * - 10008: Unknown Message (the progress message was deleted)
 * - 10062: Unknown Interaction (3s timeout expired)
 * - 40060: Already acknowledged
 * - 50013: Missing Permissions
 * - 50001: Missing Access
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Permission errors (Discord permissions) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/**
 * Network errors (transient).
 *
 * Node system errors, plus what global fetch throws: a TypeError("fetch failed")
 * whose `cause` carries the libuv code, or a TimeoutError/AbortError DOMException
 * when a signal fires.
 */
export interface NetworkError extends AppError {
  kind: "network";
  code: string; // ECONNRESET, ETIMEDOUT, ENOTFOUND, ECONNREFUSED
  host?: string;
}

/** Configuration errors */
export interface ConfigError extends AppError {
  kind: "config";
  key: string;
  expected?: string;
}

/** Unknown/unclassified errors */
export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | PermissionError
  | NetworkError
  | ConfigError
  | UnknownError;

/**
 * Thrown when a feature is used without the settings it needs. classifyError
 * recognises it by name so the error card can show which key is missing.
 */
export class MissingConfigError extends Error {
  readonly key: string;

  constructor(key: string, message = `${key} is not configured`) {
    super(message);
    this.name = "MissingConfigError";
    this.key = key;
  }
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_SOCKET"];

// ===== Error Classification =====

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: config, SQLite, Discord, network
 * (direct code, then fetch's `cause`), timeouts, permission codes, unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const error = asRecord(err);
  const message = optionalString(error?.message) ?? String(err);
  const code = error?.code;
  const name = optionalString(error?.name);
  const cause = err instanceof Error ? err : undefined;

  if (err instanceof MissingConfigError) {
    return { kind: "config", key: err.key, message, cause };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      cause,
    };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: optionalNumber(error?.status) ?? optionalNumber(error?.httpStatus),
      method: optionalString(error?.method),
      path: optionalString(error?.url) ?? optionalString(error?.path),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optionalString(error?.hostname) ?? optionalString(error?.host),
      message,
      cause,
    };
  }

  // fetch wraps the socket error: TypeError("fetch failed", { cause: { code } })
  const inner = asRecord(error?.cause);
  const innerCode = inner?.code;
  if (typeof innerCode === "string" && NETWORK_CODES.includes(innerCode)) {
    return {
      kind: "network",
      code: innerCode,
      host: optionalString(inner?.hostname) ?? optionalString(inner?.host),
      message: optionalString(inner?.message) ?? message,
      cause,
    };
  }

  if (name === "TimeoutError" || name === "AbortError") {
    return { kind: "network", code: "ETIMEDOUT", message, cause };
  }

  // 50013 = Missing Permissions, 50001 = Missing Access (can't even see the channel)
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Check if error is recoverable (worth retrying).
 * Conservative: retrying a logic error only amplifies it.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    case "discord_api": {
      // Discord 5xx; 429s are already handled inside discord.js
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    default:
      return false;
  }
}

/**
 * Check if error should be reported to Sentry.
 * Sentry alerts should mean "something is broken", not "Discord had a hiccup".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message (deleted before we could edit it)
        10003, // Unknown channel
        50013, // Missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "permission":
    case "config":
      return false;

    default:
      return true;
  }
}

/**
 * The message we were editing no longer exists (deleted by a user or a mod).
 */
export function isUnknownMessage(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10008;
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code };

    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "permission":
      return { ...base, neededPerms: err.needed };

    case "config":
      return { ...base, configKey: err.key };

    default:
      return base;
  }
}
