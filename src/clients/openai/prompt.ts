/**
 * Prompt for job field extraction
 */

import type { PlatformHint } from "@/types";

export const EXTRACTION_SYSTEM_PROMPT = [
  "You extract structured fields from job posting text.",
  "Return ONLY a JSON object with these keys: title, company, aboutCompany, location,",
  "alternateLocations, employmentType, aboutJob, qualifications, benefits, salary, workEnvironment.",
  "Copy text verbatim from the posting; do not summarize or rewrite.",
  "Drop emoji and decorative symbols. When the posting delimits sections with emoji",
  "markers or headings, map each section to the matching field.",
  "aboutJob holds the role description and responsibilities together.",
  "location is the primary location (city, state or country as written);",
  "alternateLocations lists any other locations as an array of strings.",
  "employmentType is the employment type as written (e.g. Full-time, Contract).",
  "workEnvironment is one of Remote, Hybrid, On-site when stated.",
  "salary is the compensation text as written, including the pay period.",
  "Use null for anything the posting does not state.",
].join(" ");

export function buildExtractionUserPrompt(
  rawContent: string,
  platformHint: PlatformHint,
  sourceUrl: string,
): string {
  return [
    `Platform: ${platformHint}`,
    `URL: ${sourceUrl}`,
    "",
    "Posting text:",
    rawContent,
  ].join("\n");
}
