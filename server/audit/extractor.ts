import * as cheerio from "cheerio";
import type { PageHeading, PageMeta } from "./types";
import { normalizeUrl } from "./url-utils";

const NON_CONTENT_SELECTORS = ["script", "style", "noscript", "template", "svg", "iframe"];

const SUBRESOURCE_SELECTORS: Array<[string, string]> = [
  ["script[src]", "src"],
  ["img[src]", "src"],
  ["iframe[src]", "src"],
  ["link[rel='stylesheet'][href]", "href"],
  ["source[src]", "src"],
  ["video[src]", "src"],
  ["audio[src]", "src"],
];

export interface ExtractedPage {
  title: string | null;
  meta: PageMeta;
  links: string[];
}

function attrOrNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function collectJsonLdTypes(value: unknown, types: string[]): void {
  if (Array.isArray(value)) {
    value.forEach((item) => collectJsonLdTypes(item, types));
    return;
  }
  if (!value || typeof value !== "object") return;

  for (const [key, child] of Object.entries(value)) {
    if (key === "@type") {
      const typeValues = Array.isArray(child) ? child : [child];
      for (const t of typeValues) {
        if (typeof t === "string") types.push(t);
      }
    } else if (child && typeof child === "object") {
      collectJsonLdTypes(child, types);
    }
  }
}

function extractJsonLdTypes($: cheerio.CheerioAPI): string[] {
  const types: string[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    try {
      collectJsonLdTypes(JSON.parse($(el).text()), types);
    } catch {
      // Invalid JSON-LD blocks carry no types.
      return;
    }
  });

  return Array.from(new Set(types));
}

/** Links in document order, resolved against `baseUrl`, normalized and deduplicated. */
export function extractLinks($: cheerio.CheerioAPI, baseUrl: string): string[] {
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    const normalized = normalizeUrl(href, baseUrl);
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      links.push(normalized);
    }
  });

  return links;
}

function extractInsecureResources($: cheerio.CheerioAPI, pageUrl: string): string[] {
  if (!pageUrl.startsWith("https:")) return [];

  const insecure = new Set<string>();
  for (const [selector, attr] of SUBRESOURCE_SELECTORS) {
    $(selector).each((_, el) => {
      const value = $(el).attr(attr)?.trim();
      if (value && value.toLowerCase().startsWith("http://")) {
        insecure.add(value);
      }
    });
  }
  return Array.from(insecure);
}

function countWords(text: string): number {
  const normalized = text.replace(/\s+/g, " ").trim();
  return normalized ? normalized.split(" ").length : 0;
}

export function extractPageData(html: string, url: string): ExtractedPage {
  const $ = cheerio.load(html);

  const title = attrOrNull($("title").first().text());

  const headings: PageHeading[] = [];
  $("h1, h2, h3, h4, h5, h6").each((_, el) => {
    const tagName = $(el).prop("tagName");
    if (!tagName) return;
    const text = $(el).text().replace(/\s+/g, " ").trim();
    headings.push({ level: parseInt(tagName.charAt(1), 10), text });
  });

  const imagesWithoutAlt: string[] = [];
  const images = $("img");
  images.each((_, el) => {
    const alt = $(el).attr("alt");
    if (alt === undefined) {
      imagesWithoutAlt.push($(el).attr("src") ?? "(inline image)");
    }
  });

  const $body = $("body").clone();
  NON_CONTENT_SELECTORS.forEach((sel) => {
    $body.find(sel).remove();
  });
  // Element boundaries separate words; .text() would otherwise glue them.
  $body.find("*").before(" ").after(" ");

  const meta: PageMeta = {
    description: attrOrNull($('meta[name="description" i]').attr("content")),
    canonical: attrOrNull($('link[rel="canonical" i]').attr("href")),
    robots: attrOrNull($('meta[name="robots" i]').attr("content")),
    viewport: attrOrNull($('meta[name="viewport" i]').attr("content")),
    lang: attrOrNull($("html").attr("lang")),
    charset:
      attrOrNull($("meta[charset]").attr("charset")) ??
      attrOrNull($('meta[http-equiv="content-type" i]').attr("content")),
    openGraph: {
      title: attrOrNull($('meta[property="og:title"]').attr("content")),
      description: attrOrNull($('meta[property="og:description"]').attr("content")),
      image: attrOrNull($('meta[property="og:image"]').attr("content")),
    },
    h1: headings.filter((h) => h.level === 1).map((h) => h.text),
    headings,
    imageCount: images.length,
    imagesWithoutAlt,
    jsonLdTypes: extractJsonLdTypes($),
    wordCount: countWords($body.text()),
    insecureResources: extractInsecureResources($, url),
  };

  return { title, meta, links: extractLinks($, url) };
}
