/**
 * schema.org JobPosting (JSON-LD) reader
 *
 * Many boards embed a JobPosting object for search engines; when present
 * it is the most reliable static source of title, location and type.
 */

import { load } from "cheerio";
import type { ExtractedFields } from "@/types";
import { fragmentToText } from "@/utils";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function str(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (isObject(value)) {
    return str(value.name);
  }
  return null;
}

function isJobPosting(value: JsonObject): boolean {
  return asArray(value["@type"]).some((t) => t === "JobPosting");
}

function findJobPosting(node: unknown): JsonObject | null {
  for (const item of asArray(node)) {
    if (!isObject(item)) {
      continue;
    }
    if (isJobPosting(item)) {
      return item;
    }
    const nested = findJobPosting(item["@graph"]);
    if (nested) {
      return nested;
    }
  }
  return null;
}

function safeParse(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}

/**
 * First JobPosting object embedded in the page, if any
 */
export function readJobPosting(html: string): JsonObject | null {
  const $ = load(html);
  const scripts = $('script[type="application/ld+json"]').toArray();

  for (const script of scripts) {
    const posting = findJobPosting(safeParse($(script).text()));
    if (posting) {
      return posting;
    }
  }
  return null;
}

function formatPlace(place: unknown): string | null {
  if (!isObject(place)) {
    return str(place);
  }
  const address = isObject(place.address) ? place.address : null;
  if (!address) {
    return str(place.address) ?? str(place.name);
  }
  const parts = [
    str(address.addressLocality),
    str(address.addressRegion),
    str(address.addressCountry),
  ].filter((p): p is string => p !== null);
  return parts.length > 0 ? parts.join(", ") : null;
}

function formatSalary(baseSalary: unknown): string | null {
  if (!isObject(baseSalary)) {
    return null;
  }
  const currency = str(baseSalary.currency);
  const value = baseSalary.value;
  if (!isObject(value)) {
    return null;
  }
  const symbol = currency === null || currency === "USD" ? "$" : `${currency} `;
  const min = str(value.minValue) ?? str(value.value);
  const max = str(value.maxValue);
  if (min === null) {
    return null;
  }
  const unit = str(value.unitText);
  const amount = max && max !== min ? `${symbol}${min} - ${symbol}${max}` : `${symbol}${min}`;
  return unit ? `${amount} per ${unit.toLowerCase()}` : amount;
}

/**
 * Descriptions are HTML, sometimes entity-escaped a second time
 */
function descriptionText(description: string): string {
  const html = /&lt;\/?[a-z]/i.test(description)
    ? load(`<body>${description}</body>`)("body").text()
    : description;
  return fragmentToText(html);
}

/**
 * Map a JobPosting object to extracted fields
 *
 * The description is returned whole as aboutJob; callers split it into
 * sections.
 */
export function jobPostingToFields(posting: JsonObject): ExtractedFields {
  const locations = asArray(posting.jobLocation)
    .map(formatPlace)
    .filter((l): l is string => l !== null);
  const remote = asArray(posting.jobLocationType).some((t) => t === "TELECOMMUTE");

  const employmentTypes = asArray(posting.employmentType)
    .map(str)
    .filter((t): t is string => t !== null)
    .map((t) => t.replace(/_/g, " ").toLowerCase());

  const description = str(posting.description);

  return {
    title: str(posting.title),
    company: str(posting.hiringOrganization),
    location: locations[0] ?? null,
    alternateLocations: locations.slice(1),
    employmentType: employmentTypes.length > 0 ? employmentTypes.join(", ") : null,
    aboutJob: description ? descriptionText(description) : null,
    salary: formatSalary(posting.baseSalary),
    workEnvironment: remote ? "Remote" : null,
  };
}
