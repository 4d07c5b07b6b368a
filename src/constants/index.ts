export * from "./logger";
export * from "./runLock";
export * from "./runner";
export * from "./config";
export * from "./completeness";
export * from "./urlNormalization";
export * from "./sections";
export * from "./employmentType";
export * from "./salary";
export * from "./workEnvironment";
export * from "./platforms";
export * from "./clients/http";
export * from "./clients/renderer";
export * from "./clients/ingestion";
export * from "./clients/openai";
