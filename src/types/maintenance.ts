/**
 * Maintenance type definitions
 */

export type EmployerQualityRow = {
  employerKey: string;
  total: number;
  complete: number;
  incomplete: number;
  missingTitle: number;
  missingLocation: number;
  missingEmploymentType: number;
  shortDescription: number;
};

export type DataQualityReport = {
  totalJobs: number;
  completeJobs: number;
  incompleteJobs: number;
  employers: EmployerQualityRow[];
};

export type PurgeCandidate = {
  sourceUrl: string;
  employerKey: string;
  reason: string;
};

export type PurgeResult = {
  dryRun: boolean;
  examined: number;
  candidates: PurgeCandidate[];
  deleted: number;
};
