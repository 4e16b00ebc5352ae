import type { Knex } from "knex";
import type { DbClient } from "@threadline/db";
import { ContentGraphError, type ErrorCode } from "@threadline/shared";
import { log } from "./log.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const UNIQUE_VIOLATION = "23505";

export const isUniqueViolation = (error: unknown) =>
  isRecord(error) && error.code === UNIQUE_VIOLATION;

type FailureOptions = {
  // Code reported when the work trips a unique index instead of a plain store failure.
  onUniqueViolation?: ErrorCode;
};

const toFailure = (operation: string, error: unknown, options: FailureOptions) => {
  if (error instanceof ContentGraphError) {
    return error;
  }
  if (options.onUniqueViolation && isUniqueViolation(error)) {
    return new ContentGraphError({ code: options.onUniqueViolation, cause: error });
  }
  log.error("store.failure", { operation, error });
  return new ContentGraphError({ code: "store_failure", details: operation, cause: error });
};

// Every multi-row mutation runs here: the work either commits as a whole or rolls back.
export const runInTransaction = async <T>(
  db: DbClient,
  operation: string,
  work: (trx: Knex.Transaction) => Promise<T>,
  options: FailureOptions = {}
): Promise<T> => {
  try {
    return await db.transaction(work);
  } catch (error) {
    throw toFailure(operation, error, options);
  }
};

export const runQuery = async <T>(operation: string, work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    throw toFailure(operation, error, {});
  }
};
