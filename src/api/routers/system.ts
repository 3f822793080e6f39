// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const lastRun = ctx.history.latest();

    return {
      provider: ctx.config.llm.provider,
      model: ctx.config.llm.model,
      schedule: ctx.config.schedule.run ?? null,
      concurrency: ctx.config.summarization.maxConcurrency,
      sinceHours: ctx.config.run.sinceHours,
      lastRun,
    };
  }),
});
