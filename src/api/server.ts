// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { isNotifierFailure } from "../notifier";
import { appRouter } from "./router";
import type { AppContext } from "./context";

/**
 * Creates the Express app (not started, the caller picks the port).
 *
 * - `POST /invoke`: function-style entrypoint. JSON payload
 *   `{ sampleMode?, sinceHours? }`; 200 with the run report or 500 with `{ error }`.
 * - `/api/trpc`: tRPC router (`runs.trigger`, `runs.list`, `system.status`).
 * - `GET /health`: container health check.
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.post("/invoke", express.json(), (req, res, next) => {
    const payload: unknown = req.body;

    context
      .invoke(payload, "http")
      .then((response) => {
        res.status(isNotifierFailure(response) ? 500 : 200).json(response);
      })
      .catch(next);
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
