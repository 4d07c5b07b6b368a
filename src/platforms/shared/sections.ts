/**
 * Section splitting of posting text
 *
 * Walks the visible text line by line; a line that is a known heading
 * (after decorative symbols and trailing punctuation are removed) switches
 * the field the following lines are assigned to. Lines before the first
 * heading belong to aboutJob.
 */

import { MAX_HEADING_LENGTH, SECTION_FIELDS, SECTION_HEADINGS } from "@/constants";
import type { SectionField } from "@/constants";
import { cleanText, stripDecorativeSymbols } from "@/utils";

export type PostingSections = Record<SectionField, string>;

const HEADING_INDEX: ReadonlyMap<string, SectionField> = new Map(
  SECTION_FIELDS.flatMap((field) =>
    SECTION_HEADINGS[field].map((heading): [string, SectionField] => [heading, field]),
  ),
);

/**
 * Heading text in comparable form ("🚀 What You'll Do:" → "what you'll do")
 */
export function normalizeHeading(line: string): string {
  return stripDecorativeSymbols(line)
    .replace(/^[\s\-#*]+/, "")
    .replace(/[\s:\-–—.]+$/, "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

/**
 * Field a line introduces, or null when it is not a heading
 */
export function matchHeading(line: string): SectionField | null {
  if (line.trim().length === 0 || line.length > MAX_HEADING_LENGTH) {
    return null;
  }
  return HEADING_INDEX.get(normalizeHeading(line)) ?? null;
}

export function splitSections(text: string): PostingSections {
  const buckets: Record<SectionField, string[]> = {
    aboutCompany: [],
    aboutJob: [],
    qualifications: [],
    benefits: [],
    salary: [],
    workEnvironment: [],
  };

  let current: SectionField = "aboutJob";
  for (const line of text.split("\n")) {
    const heading = matchHeading(line);
    if (heading) {
      current = heading;
      continue;
    }
    buckets[current].push(stripDecorativeSymbols(line));
  }

  return {
    aboutCompany: cleanText(buckets.aboutCompany.join("\n")),
    aboutJob: cleanText(buckets.aboutJob.join("\n")),
    qualifications: cleanText(buckets.qualifications.join("\n")),
    benefits: cleanText(buckets.benefits.join("\n")),
    salary: cleanText(buckets.salary.join("\n")),
    workEnvironment: cleanText(buckets.workEnvironment.join("\n")),
  };
}
