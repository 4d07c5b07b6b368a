export { extractJob } from "./jobExtractor";
export type { JobExtractorDeps } from "./jobExtractor";
export { normalizeCandidate } from "./normalizeCandidate";
export type { CandidateContext, CandidateResult } from "./normalizeCandidate";
export { checkGeography, classifyLocation } from "./filters/geography";
export { checkEmploymentType } from "./filters/employmentType";
export {
  standardizeSalary,
  parseSalary,
  formatSalary,
  isHourlyOnlySalary,
} from "./normalizers/salary";
export { classifyWorkEnvironment, normalizeWorkEnvironment } from "./normalizers/workEnvironment";
