export { auditDataQuality } from "./dataQualityAudit";
export { purgeNonConformingJobs } from "./purgeNonConformingJobs";
