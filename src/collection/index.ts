export { collectJobUrls } from "./urlCollector";
export type { UrlCollectorDeps } from "./urlCollector";
export { CollectionError } from "./collectionError";
