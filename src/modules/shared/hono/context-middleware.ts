import type { Context } from "hono";
import { AsyncLocalStorage } from "node:async_hooks";
import crypto from "node:crypto";

export interface AppContext {
  requestId: string;
}

const als = new AsyncLocalStorage<AppContext>();

/**
 * Stores the request context in AsyncLocalStorage so that services can tag
 * their log lines with the request that triggered them.
 * An incoming `X-Request-Id` header is kept, otherwise one is generated.
 */
export function createContextMiddleware() {
  return async (c: Context, next: () => Promise<void>) => {
    const appContext = {
      requestId: c.req.header("X-Request-Id") ?? crypto.randomUUID(),
    };
    await als.run(appContext, () => next());
  };
}

export function getContext(): AppContext {
  return als.getStore() ?? { requestId: "system" };
}
