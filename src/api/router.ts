// pattern: Imperative Shell
import { router } from "./trpc";
import { feedsRouter } from "./routers/feeds";
import { categoriesRouter } from "./routers/categories";
import { articlesRouter } from "./routers/articles";
import { syncRouter } from "./routers/sync";
import { importsRouter } from "./routers/imports";
import { settingsRouter } from "./routers/settings";
import { briefingRouter } from "./routers/briefing";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: the operations the terminal front end calls.
 */
export const appRouter = router({
  feeds: feedsRouter,
  categories: categoriesRouter,
  articles: articlesRouter,
  sync: syncRouter,
  imports: importsRouter,
  settings: settingsRouter,
  briefing: briefingRouter,
  system: systemRouter,
});

/**
 * Inferred type of the root tRPC router, for typed clients and callers.
 */
export type AppRouter = typeof appRouter;
