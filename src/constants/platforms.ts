/**
 * Platform detection and link-following constants
 */

import type { AtsPlatform, Platform } from "@/types";

export const ATS_PLATFORMS: readonly AtsPlatform[] = ["greenhouse", "lever", "ashby", "workday"];

export const ALL_PLATFORMS: readonly Platform[] = [...ATS_PLATFORMS, "generic"];

/**
 * Hostname suffixes per ATS platform
 */
export const PLATFORM_HOSTS: Readonly<Record<AtsPlatform, readonly string[]>> = {
  greenhouse: ["greenhouse.io"],
  lever: ["lever.co"],
  ashby: ["ashbyhq.com"],
  workday: ["myworkdayjobs.com", "myworkdaysite.com"],
};

/**
 * Posting path patterns per ATS platform (pathname only)
 */
export const PLATFORM_POSTING_PATHS: Readonly<Record<AtsPlatform, RegExp>> = {
  // /acme/jobs/4012345 or /embed/job_app?token=...
  greenhouse: /^\/[^/]+\/jobs\/\d+\/?$/,
  // /acme/3f2c1b9e-...
  lever: /^\/[^/]+\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\/?$/i,
  // /acme/3f2c1b9e-...
  ashby: /^\/[^/]+\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\/?$/i,
  // /en-US/External/job/San-Francisco-CA/Staff-Engineer_R12345
  workday: /\/job\/[^/]+\/[^/]+$/,
};

/**
 * Path keywords identifying posting pages on employer-hosted career sites
 */
export const GENERIC_POSTING_PATH_PATTERNS: readonly RegExp[] = [
  /\/jobs?\/[^/]+/i,
  /\/careers?\/[^/]+/i,
  /\/positions?\/[^/]+/i,
  /\/openings?\/[^/]+/i,
];

/**
 * Link-following limits
 */
export const LINK_LIMITS = {
  /** URLs longer than this are ignored (tracking/spam) */
  MAX_URL_LENGTH: 500,
  /** Maximum posting links taken from one listing page */
  MAX_LINKS_PER_LISTING: 500,
  /** File extensions never followed */
  IGNORE_EXTENSIONS: [".pdf", ".jpg", ".jpeg", ".png", ".gif", ".svg", ".zip", ".doc", ".docx"],
} as const;
