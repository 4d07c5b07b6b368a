/**
 * Employers file validation
 *
 * Validates the employers JSON structure and enforces invariants:
 * - every employer has a non-empty key and name
 * - keys are unique (they index run progress and job records)
 * - at least one absolute http(s) listing URL per employer
 * - platform, when given, is a known platform
 *
 * Validation is fail-fast: throws on the first error.
 */

import type { Employer, Platform } from "@/types";
import { ALL_PLATFORMS } from "@/constants";

export class EmployersValidationError extends Error {
  constructor(message: string) {
    super(`Employers file validation failed: ${message}`);
    this.name = "EmployersValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateNonEmptyString(value: unknown, fieldPath: string): asserts value is string {
  if (typeof value !== "string") {
    throw new EmployersValidationError(`${fieldPath} must be a string, got ${typeof value}`);
  }
  if (value.trim().length === 0) {
    throw new EmployersValidationError(`${fieldPath} cannot be empty or whitespace-only`);
  }
}

function validateListingUrl(value: unknown, fieldPath: string): string {
  validateNonEmptyString(value, fieldPath);
  const trimmed = value.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new EmployersValidationError(`${fieldPath} must be an absolute URL, got "${trimmed}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new EmployersValidationError(`${fieldPath} must use http or https, got "${trimmed}"`);
  }
  return trimmed;
}

function isPlatform(value: string): value is Platform {
  return ALL_PLATFORMS.some((p) => p === value);
}

/**
 * Validate one employer entry
 *
 * Accepts `listingUrls` (array) or a single `listingUrl` string.
 */
function validateEmployer(entry: unknown, index: number): Employer {
  const prefix = `employers[${index}]`;
  if (!isRecord(entry)) {
    throw new EmployersValidationError(`${prefix} must be an object`);
  }

  validateNonEmptyString(entry.key, `${prefix}.key`);
  validateNonEmptyString(entry.name, `${prefix}.name`);

  let listingUrls: string[];
  if (entry.listingUrls !== undefined) {
    if (!Array.isArray(entry.listingUrls) || entry.listingUrls.length === 0) {
      throw new EmployersValidationError(`${prefix}.listingUrls must be a non-empty array`);
    }
    listingUrls = entry.listingUrls.map((url: unknown, urlIndex: number) =>
      validateListingUrl(url, `${prefix}.listingUrls[${urlIndex}]`),
    );
  } else if (entry.listingUrl !== undefined) {
    listingUrls = [validateListingUrl(entry.listingUrl, `${prefix}.listingUrl`)];
  } else {
    throw new EmployersValidationError(`${prefix} must define listingUrls`);
  }

  const employer: Employer = {
    key: entry.key.trim(),
    name: entry.name.trim(),
    listingUrls,
  };

  if (entry.platform !== undefined) {
    validateNonEmptyString(entry.platform, `${prefix}.platform`);
    const platform = entry.platform.trim().toLowerCase();
    if (!isPlatform(platform)) {
      throw new EmployersValidationError(
        `${prefix}.platform must be one of ${ALL_PLATFORMS.join(", ")}, got "${entry.platform}"`,
      );
    }
    employer.platform = platform;
  }

  return employer;
}

/**
 * Validate raw employers file data
 *
 * @returns Employers in file order
 * @throws {EmployersValidationError} On the first violation
 */
export function validateEmployersFile(raw: unknown): Employer[] {
  if (!isRecord(raw)) {
    throw new EmployersValidationError("Employers file must be an object");
  }
  if (!Array.isArray(raw.employers)) {
    throw new EmployersValidationError("employers must be an array");
  }

  const employers = raw.employers.map((entry: unknown, index: number) =>
    validateEmployer(entry, index),
  );

  const seen = new Set<string>();
  for (const employer of employers) {
    if (seen.has(employer.key)) {
      throw new EmployersValidationError(`Duplicate employer key: "${employer.key}"`);
    }
    seen.add(employer.key);
  }

  return employers;
}
