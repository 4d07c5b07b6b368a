export * from "./logger";
export * from "./db";
export * from "./job";
export * from "./platforms";
export * from "./employer";
export * from "./freshness";
export * from "./merge";
export * from "./extraction";
export * from "./submission";
export * from "./progress";
export * from "./runner";
export * from "./runLock";
export * from "./config";
export * from "./maintenance";
export * from "./clients/http";
