/**
 * Shared building blocks for rule-based posting extraction
 */

import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { ExtractedFields, RenderedPage } from "@/types";
import { cleanText, fragmentToText } from "@/utils";
import { jobPostingToFields, readJobPosting } from "./jsonLd";
import { splitSections } from "./sections";

/**
 * Values read straight from platform-specific markup
 *
 * `description` is the posting body as text; it is split into sections.
 */
export type ScrapedPosting = {
  title?: string | null;
  company?: string | null;
  location?: string | null;
  alternateLocations?: string[];
  employmentType?: string | null;
  salary?: string | null;
  workEnvironment?: string | null;
  description?: string | null;
};

export function loadPage(page: RenderedPage): CheerioAPI {
  return load(page.html);
}

/**
 * Text of the first selector that yields non-empty text
 */
export function firstText($: CheerioAPI, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const text = cleanText($(selector).first().text());
    if (text) {
      return text;
    }
  }
  return null;
}

/**
 * Text of every element matching `selector`, one block per element
 */
export function allText($: CheerioAPI, selector: string): string | null {
  const blocks = $(selector)
    .toArray()
    .map((el) => fragmentToText($(el).html() ?? ""))
    .filter((text) => text.length > 0);
  return blocks.length > 0 ? blocks.join("\n\n") : null;
}

/**
 * Body text of the first selector with content
 */
export function firstBlockText($: CheerioAPI, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const html = $(selector).first().html();
    if (html) {
      const text = fragmentToText(html);
      if (text) {
        return text;
      }
    }
  }
  return null;
}

function orNull(value: string): string | null {
  return value ? value : null;
}

/**
 * Combine markup values with the page's JobPosting JSON-LD and the
 * section split of the description
 *
 * Markup wins over JSON-LD; the whole visible text is the description of
 * last resort.
 */
export function composeFallbackFields(page: RenderedPage, scraped: ScrapedPosting): ExtractedFields {
  const posting = readJobPosting(page.html);
  const ld: ExtractedFields = posting ? jobPostingToFields(posting) : {};

  const description = scraped.description ?? ld.aboutJob ?? page.text;
  const sections = splitSections(description);

  const alternateLocations =
    scraped.alternateLocations && scraped.alternateLocations.length > 0
      ? scraped.alternateLocations
      : ld.alternateLocations ?? [];

  return {
    title: scraped.title ?? ld.title ?? null,
    company: scraped.company ?? ld.company ?? null,
    aboutCompany: orNull(sections.aboutCompany),
    location: scraped.location ?? ld.location ?? null,
    alternateLocations,
    employmentType: scraped.employmentType ?? ld.employmentType ?? null,
    aboutJob: orNull(sections.aboutJob),
    qualifications: orNull(sections.qualifications),
    benefits: orNull(sections.benefits),
    salary: scraped.salary ?? ld.salary ?? orNull(sections.salary),
    workEnvironment: scraped.workEnvironment ?? ld.workEnvironment ?? orNull(sections.workEnvironment),
  };
}
