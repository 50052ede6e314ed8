import { initTRPC } from "@trpc/server";
import { ZodError } from "zod";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError:
          error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

export const router = t.router;

export const publicProcedure = t.procedure;

/**
 * Calls procedures directly without HTTP transport; used by tests.
 */
export const createCallerFactory = t.createCallerFactory;
