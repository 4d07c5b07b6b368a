/**
 * URL normalization constants
 */

/**
 * Query parameter prefixes removed from posting URLs (campaign tracking)
 */
export const TRACKING_PARAM_PREFIXES: readonly string[] = ["utm_"];

/**
 * Exact query parameter names removed from posting URLs
 *
 * gh_jid is not listed: on embedded Greenhouse boards it is the
 * posting identifier itself.
 */
export const TRACKING_PARAMS: readonly string[] = [
  "gclid",
  "fbclid",
  "msclkid",
  "mc_cid",
  "mc_eid",
  "_hsenc",
  "_hsmi",
  "igshid",
  "gh_src",
  "lever-source",
  "lever-origin",
  "lever-via",
  "ref",
  "referrer",
  "trk",
  "source",
];
