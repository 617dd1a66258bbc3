import { errorMessage } from "./errors";

export type FailureKind = "not_found" | "transient" | "fatal";

export interface Failure {
  kind: FailureKind;
  message: string;
  cause?: unknown;
}

export type Result<T, E = Failure> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = Failure>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function failure(kind: FailureKind, message: string, cause?: unknown): Failure {
  return { kind, message, cause };
}

/**
 * Runs `fn` and folds a thrown error into a Failure. Errors carrying
 * `fatal: true` or a `code` ending in `_FATAL` are classified as fatal;
 * everything else thrown across a boundary is treated as transient.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(failure(classifyThrown(error), errorMessage(error), error));
  }
}

export function classifyThrown(error: unknown): FailureKind {
  if (typeof error === "object" && error !== null) {
    if ("fatal" in error && error.fatal === true) return "fatal";
    if ("code" in error && typeof error.code === "string" && error.code.endsWith("_FATAL")) return "fatal";
  }
  return "transient";
}
