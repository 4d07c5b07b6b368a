export {
  IngestionApiClient,
  MalformedIngestionResponseError,
  parseIngestionResponse,
} from "./ingestionClient";
export type { IngestionClientConfig } from "./ingestionClient";
export { toNormalizedJob } from "./mappers";
