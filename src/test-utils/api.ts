import { vi } from "vitest";
import pino from "pino";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { AppContext, InvokeFn } from "../api/context";
import { createRunHistory } from "../notifier";
import { createTestConfig } from "./fixtures";

/**
 * Builds an AppContext with an in-memory history and a stubbed notifier.
 */
export function createTestContext(overrides?: Partial<AppContext>): AppContext {
  return {
    config: createTestConfig(),
    logger: pino({ level: "silent" }),
    history: createRunHistory(),
    invoke: vi.fn<InvokeFn>(),
    ...overrides,
  };
}

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 */
export function createTestCaller(context: AppContext) {
  return createCallerFactory(appRouter)(context);
}
