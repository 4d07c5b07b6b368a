/**
 * Platform adapter registry
 */

import type { Platform } from "@/types";
import type { PlatformAdapter } from "@/interfaces";
import { tryParseUrl } from "@/utils";
import { greenhouseAdapter } from "./greenhouse";
import { leverAdapter } from "./lever";
import { ashbyAdapter } from "./ashby";
import { workdayAdapter } from "./workday";
import { genericAdapter } from "./generic";

const ADAPTERS: Readonly<Record<Platform, PlatformAdapter>> = {
  greenhouse: greenhouseAdapter,
  lever: leverAdapter,
  ashby: ashbyAdapter,
  workday: workdayAdapter,
  generic: genericAdapter,
};

/**
 * Checked in order; generic matches everything and comes last
 */
const DETECTION_ORDER: readonly PlatformAdapter[] = [
  greenhouseAdapter,
  leverAdapter,
  ashbyAdapter,
  workdayAdapter,
];

export function getPlatformAdapter(platform: Platform): PlatformAdapter {
  return ADAPTERS[platform];
}

/**
 * Platform of a URL from its host ("generic" when unrecognized)
 */
export function detectPlatform(rawUrl: string): Platform {
  const url = tryParseUrl(rawUrl);
  if (!url) {
    return "generic";
  }
  return DETECTION_ORDER.find((adapter) => adapter.matchesUrl(url))?.platform ?? "generic";
}

/**
 * Adapter for a posting URL
 *
 * Postings linked from a generic career page may live on an ATS; the URL's
 * own host decides. A configured employer platform applies to URLs on
 * unrecognized hosts.
 */
export function resolvePostingAdapter(postingUrl: string, employerPlatform?: Platform): PlatformAdapter {
  const detected = detectPlatform(postingUrl);
  if (detected !== "generic") {
    return ADAPTERS[detected];
  }
  return ADAPTERS[employerPlatform ?? "generic"];
}
