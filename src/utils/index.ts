/**
 * Utils barrel exports
 */

export * from "./url/normalizeUrl";
export * from "./text/cleanText";
export * from "./html/htmlToText";
export * from "./concurrency";
export * from "./dbErrors";
export * from "./employersValidation";
