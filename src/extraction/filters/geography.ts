/**
 * Geography filter
 *
 * Only postings with a confirmed US location are accepted. Without a
 * non-US marker, a location is confirmed by a US country term, a state
 * name, a known US city or a two-letter state abbreviation after a comma.
 * With a non-US marker, only a US country term confirms it. A state that
 * shares its name with a country (Georgia) needs other evidence.
 * Everything else is rejected.
 */

import geography from "@/data/usGeography.json";
import type { FilterResult } from "@/types";

export type LocationClass = "us" | "non_us" | "ambiguous";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-term matcher (letters on either side break the match)
 */
function termPattern(terms: readonly string[]): RegExp {
  const alternatives = [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  return new RegExp(`(?<![a-z])(?:${alternatives})(?![a-z])`, "i");
}

const COUNTRY_NAMED_STATES = new Set(geography.countryNamedStates.map((name) => name.toLowerCase()));

const COUNTRY_TERMS = termPattern(geography.countryTerms);
const STATE_NAMES = termPattern(
  geography.states.map((s) => s.name).filter((name) => !COUNTRY_NAMED_STATES.has(name.toLowerCase())),
);
const US_CITIES = termPattern(geography.cities);
const NON_US_MARKERS = termPattern(geography.nonUsMarkers);
/** State names that contain a marker ("New Mexico") */
const MARKER_STATE_NAMES = new RegExp(
  termPattern(geography.states.map((s) => s.name).filter((name) => NON_US_MARKERS.test(name))).source,
  "gi",
);
const STATE_ABBREVIATIONS = new Set(geography.states.map((s) => s.abbreviation));
const ABBREVIATION_AFTER_COMMA = /,\s*([A-Z]{2})(?![A-Za-z])/g;

function hasStateAbbreviation(location: string): boolean {
  for (const match of location.matchAll(ABBREVIATION_AFTER_COMMA)) {
    if (STATE_ABBREVIATIONS.has(match[1])) {
      return true;
    }
  }
  return false;
}

export function classifyLocation(location: string): LocationClass {
  const text = location.trim();
  if (!text) {
    return "ambiguous";
  }
  const usCountry = COUNTRY_TERMS.test(text);
  if (NON_US_MARKERS.test(text.replace(MARKER_STATE_NAMES, " "))) {
    return usCountry ? "us" : "non_us";
  }
  if (usCountry || STATE_NAMES.test(text) || US_CITIES.test(text) || hasStateAbbreviation(text)) {
    return "us";
  }
  return "ambiguous";
}

/**
 * Accept when the primary or any alternate location is confirmed US
 */
export function checkGeography(location: string, alternateLocations: readonly string[]): FilterResult {
  const candidates = [location, ...alternateLocations].filter((l) => l.trim().length > 0);
  if (candidates.length === 0) {
    return { ok: false, reason: "unconfirmed_location", detail: "no location stated" };
  }

  const classes = candidates.map(classifyLocation);
  if (classes.includes("us")) {
    return { ok: true };
  }

  const detail = candidates.join(" | ");
  return classes.includes("non_us")
    ? { ok: false, reason: "non_us_location", detail }
    : { ok: false, reason: "unconfirmed_location", detail };
}
