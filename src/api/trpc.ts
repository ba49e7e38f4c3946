// pattern: Functional Core
import { initTRPC, TRPCError } from "@trpc/server";
import type { AppContext } from "./context";
import { FeedParseError, NotFoundError, ValidationError } from "../errors";

const t = initTRPC.context<AppContext>().create();

/**
 * Translates domain errors thrown by store and sync functions into tRPC
 * error codes. Anything else stays an internal server error.
 */
const mapDomainErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (result.ok) return result;

  const cause = result.error.cause;
  if (cause instanceof NotFoundError) {
    throw new TRPCError({ code: "NOT_FOUND", message: cause.message, cause });
  }
  if (cause instanceof ValidationError) {
    const code =
      cause.code === "duplicate_feed_url" || cause.code === "duplicate_category_name"
        ? "CONFLICT"
        : "BAD_REQUEST";
    throw new TRPCError({ code, message: cause.message, cause });
  }
  if (cause instanceof FeedParseError) {
    throw new TRPCError({ code: "BAD_REQUEST", message: cause.message, cause });
  }
  return result;
});

/**
 * tRPC router factory for creating nested route definitions.
 */
export const router = t.router;

/**
 * Procedure factory for queries and mutations; domain errors are mapped.
 */
export const publicProcedure = t.procedure.use(mapDomainErrors);

/**
 * tRPC caller factory for calling procedures directly without HTTP transport.
 * Useful for testing procedures in isolation.
 */
export const createCallerFactory = t.createCallerFactory;
