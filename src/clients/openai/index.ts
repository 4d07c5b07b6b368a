export { OpenAiExtractor, createOpenAiCompleter } from "./openaiExtractor";
export type {
  ChatCompleter,
  ChatCompletionReply,
  ChatCompletionRequest,
  OpenAiExtractorOptions,
} from "./openaiExtractor";
export { ExtractionError } from "./extractionError";
export { ExtractedJobSchema } from "./extractionSchema";
