export * from "./completeness";
export * from "./freshnessEvaluator";
