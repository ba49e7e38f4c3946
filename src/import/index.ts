export { readOpml } from "./opml";
export { importFeeds } from "./importer";
export type { FeedSpec, ImportItem, ImportReport } from "./types";
