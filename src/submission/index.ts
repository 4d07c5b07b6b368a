export { BatchSubmitter, isRetryableSubmissionError } from "./batchSubmitter";
export type { BatchSubmitterOptions } from "./batchSubmitter";
export { redeliverFailedBatches } from "./redeliverFailedBatches";
export { SubmissionTransportError } from "./submissionErrors";
