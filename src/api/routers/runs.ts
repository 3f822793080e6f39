// pattern: Imperative Shell
import { TRPCError } from "@trpc/server";
import { z } from "zod";
import { invocationPayloadSchema, isNotifierFailure } from "../../notifier";
import { router, publicProcedure } from "../trpc";

export const runsRouter = router({
  trigger: publicProcedure
    .input(invocationPayloadSchema)
    .mutation(async ({ ctx, input }) => {
      const response = await ctx.invoke(input, "api");

      if (isNotifierFailure(response)) {
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: response.error,
        });
      }

      return response;
    }),

  list: publicProcedure
    .input(
      z
        .object({
          limit: z.number().int().positive().max(100).optional(),
        })
        .optional(),
    )
    .query(({ ctx, input }) => ctx.history.list(input?.limit)),
});
