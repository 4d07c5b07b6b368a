/**
 * OpenAI-backed Extractor
 *
 * One chat completion in JSON mode per posting; the reply is parsed and
 * validated with zod. Any failure surfaces as ExtractionError so the
 * caller can fall back to rule-based extraction.
 */

import OpenAI from "openai";
import type { ExtractedFields, PlatformHint } from "@/types";
import type { Extractor, ExtractorUsage } from "@/interfaces";
import {
  OPENAI_MAX_CONTENT_CHARS,
  OPENAI_MAX_OUTPUT_TOKENS,
  OPENAI_TEMPERATURE,
  OPENAI_TIMEOUT_MS,
} from "@/constants";
import { errorMessage } from "@/utils";
import { ExtractedJobSchema } from "./extractionSchema";
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionUserPrompt } from "./prompt";
import { ExtractionError } from "./extractionError";

/**
 * One completion call, reduced to what the extractor needs
 */
export type ChatCompletionRequest = {
  model: string;
  system: string;
  user: string;
};

export type ChatCompletionReply = {
  content: string | null;
  promptTokens: number;
  completionTokens: number;
};

export type ChatCompleter = (req: ChatCompletionRequest) => Promise<ChatCompletionReply>;

/**
 * ChatCompleter over the OpenAI SDK (JSON mode)
 */
export function createOpenAiCompleter(apiKey: string): ChatCompleter {
  const client = new OpenAI({ apiKey, timeout: OPENAI_TIMEOUT_MS, maxRetries: 1 });

  return async (req) => {
    const completion = await client.chat.completions.create({
      model: req.model,
      temperature: OPENAI_TEMPERATURE,
      max_tokens: OPENAI_MAX_OUTPUT_TOKENS,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.user },
      ],
    });

    return {
      content: completion.choices[0]?.message?.content ?? null,
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
    };
  };
}

export type OpenAiExtractorOptions = {
  model: string;
  /** Defaults to the SDK-backed completer; tests inject a fake */
  complete?: ChatCompleter;
  apiKey?: string;
};

export class OpenAiExtractor implements Extractor {
  private readonly model: string;
  private readonly complete: ChatCompleter;
  private readonly counters: ExtractorUsage = {
    calls: 0,
    failures: 0,
    promptTokens: 0,
    completionTokens: 0,
  };

  constructor(options: OpenAiExtractorOptions) {
    this.model = options.model;
    if (options.complete) {
      this.complete = options.complete;
    } else if (options.apiKey) {
      this.complete = createOpenAiCompleter(options.apiKey);
    } else {
      throw new Error("OpenAiExtractor needs either an apiKey or a completer");
    }
  }

  async extract(
    rawContent: string,
    platformHint: PlatformHint,
    sourceUrl: string,
  ): Promise<ExtractedFields> {
    this.counters.calls++;

    let reply: ChatCompletionReply;
    try {
      reply = await this.complete({
        model: this.model,
        system: EXTRACTION_SYSTEM_PROMPT,
        user: buildExtractionUserPrompt(
          rawContent.slice(0, OPENAI_MAX_CONTENT_CHARS),
          platformHint,
          sourceUrl,
        ),
      });
    } catch (err) {
      this.counters.failures++;
      throw new ExtractionError(sourceUrl, `completion request failed: ${errorMessage(err)}`, err);
    }

    this.counters.promptTokens += reply.promptTokens;
    this.counters.completionTokens += reply.completionTokens;

    if (!reply.content) {
      this.counters.failures++;
      throw new ExtractionError(sourceUrl, "empty completion");
    }

    let json: unknown;
    try {
      json = JSON.parse(reply.content);
    } catch (err) {
      this.counters.failures++;
      throw new ExtractionError(sourceUrl, "completion is not valid JSON", err);
    }

    const parsed = ExtractedJobSchema.safeParse(json);
    if (!parsed.success) {
      this.counters.failures++;
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "schema mismatch";
      throw new ExtractionError(sourceUrl, `invalid structure (${detail})`);
    }

    return parsed.data;
  }

  usage(): ExtractorUsage {
    return { ...this.counters };
  }
}
