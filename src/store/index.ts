export {
  addFeed,
  removeFeed,
  getFeed,
  listFeeds,
  listFeedIds,
  findFeedByUrl,
  setFeedCategory,
  renameFeed,
  recordSyncSuccess,
  recordSyncFailure,
  validateFeedUrl,
} from "./feeds";
export {
  listCategories,
  createCategory,
  renameCategory,
  deleteCategory,
  resolveCategoryId,
  validateCategoryName,
  isUncategorized,
} from "./categories";
export {
  markRead,
  toggleSaved,
  getArticle,
  listArticles,
  unreadCounts,
  articlesSince,
  searchArticles,
  setFullContent,
  take,
} from "./articles";
export { getSetting, getBoolSetting, setSetting, listSettings } from "./settings";
export type { AddFeedResult, FeedSummary, NewFeed } from "./feeds";
export type { CategorySummary } from "./categories";
export type { ArticleFilters, ArticleWithFeed, MarkReadTarget } from "./articles";
