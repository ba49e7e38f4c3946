// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { articlesSince, getBoolSetting } from "../../store";
import { DEFAULT_BRIEFING_LIMIT, buildBriefingInput } from "../../briefing";

export const BRIEFING_SETTING = "enable_ai_briefing";

/**
 * Hands the front end the summarizer input for the daily briefing; the
 * front end runs the text generator itself.
 */
export const briefingRouter = router({
  input: publicProcedure
    .input(
      z.object({
        since: z.coerce.date(),
        limit: z.number().int().positive().max(100).default(DEFAULT_BRIEFING_LIMIT),
      }),
    )
    .query(({ ctx, input }) => {
      if (!getBoolSetting(ctx.db, BRIEFING_SETTING, false)) {
        return { enabled: false as const };
      }
      const rows = articlesSince(ctx.db, input.since, input.limit);
      return { enabled: true as const, ...buildBriefingInput(rows) };
    }),
});
