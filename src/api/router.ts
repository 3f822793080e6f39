// pattern: Imperative Shell
import { router } from "./trpc";
import { runsRouter } from "./routers/runs";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: manual runs, run history and service status.
 */
export const appRouter = router({
  runs: runsRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
