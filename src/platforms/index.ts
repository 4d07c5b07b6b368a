export { getPlatformAdapter, detectPlatform, resolvePostingAdapter } from "./registry";
export { greenhouseAdapter } from "./greenhouse";
export { leverAdapter } from "./lever";
export { ashbyAdapter } from "./ashby";
export { workdayAdapter } from "./workday";
export { genericAdapter } from "./generic";
export { splitSections, matchHeading, normalizeHeading } from "./shared/sections";
export type { PostingSections } from "./shared/sections";
export { readJobPosting, jobPostingToFields } from "./shared/jsonLd";
export { filterPostingLinks, isAtsPostingUrl, isAnyAtsPostingUrl } from "./shared/postingLinks";
