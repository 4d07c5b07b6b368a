/**
 * Platform (ATS) type definitions
 */

/**
 * Closed set of job board platforms with a dedicated adapter
 *
 * "generic" covers employer-hosted career pages without a known ATS.
 */
export type Platform = "greenhouse" | "lever" | "ashby" | "workday" | "generic";

/**
 * Platforms recognizable from their host name
 */
export type AtsPlatform = Exclude<Platform, "generic">;

/**
 * Page content returned by the renderer
 */
export type RenderedPage = {
  /** URL the content was rendered from */
  url: string;
  /** Raw markup */
  html: string;
  /** Visible text derived from the markup (block elements on their own lines) */
  text: string;
};
