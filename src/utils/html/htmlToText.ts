/**
 * HTML helpers built on cheerio
 */

import { load } from "cheerio";
import { cleanText } from "../text/cleanText";

const NON_CONTENT_SELECTOR = "script, style, noscript, svg, template, iframe";

const BLOCK_SELECTOR = [
  "p", "div", "section", "article", "main", "header", "footer", "aside",
  "h1", "h2", "h3", "h4", "h5", "h6",
  "ul", "ol", "dl", "dt", "dd",
  "table", "tr", "blockquote", "pre",
].join(", ");

/**
 * Visible text of an HTML document, block elements on their own lines
 */
export function htmlToText(html: string): string {
  const $ = load(html);
  $(NON_CONTENT_SELECTOR).remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTOR).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });
  $("li").each((_, el) => {
    $(el).prepend("\n- ").append("\n");
  });

  return cleanText($("body").text());
}

/**
 * Text of an HTML fragment (descriptions embedded as HTML strings)
 */
export function fragmentToText(fragment: string): string {
  return htmlToText(`<body>${fragment}</body>`);
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Absolute href of every anchor in the document, in document order
 *
 * Relative hrefs are resolved against `baseUrl`; unparsable ones are dropped.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = load(html);
  const links: string[] = [];

  $("a[href]").each((_, node) => {
    const href = ($(node).attr("href") ?? "").trim();
    if (!href || href.startsWith("#") || href.startsWith("mailto:") || href.startsWith("javascript:")) {
      return;
    }
    const resolved = resolveHref(href, baseUrl);
    if (resolved) {
      links.push(resolved);
    }
  });

  return links;
}
