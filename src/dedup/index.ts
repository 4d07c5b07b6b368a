export { MergeEngine } from "./mergeEngine";
export { decideMerge, mergeRecords, isMoreComplete } from "./mergeDecision";
