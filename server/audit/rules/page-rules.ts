import type { Finding } from "../types";
import { createFinding, excerpt, pageCheck, type PageCheck } from "./define";

export const TITLE_LENGTH = { min: 10, max: 60 } as const;
export const DESCRIPTION_LENGTH = { min: 50, max: 160 } as const;
export const THIN_CONTENT_WORDS = 150;

const none: Finding[] = [];

const titleMissing = pageCheck("title-missing", "Page has a non-empty <title>", (page) =>
  page.title ? none : [createFinding("title-missing", page, "critical", "Page has no <title>.")]
);

const titleLength = pageCheck("title-length", "Title length is within search-result limits", (page) => {
  if (!page.title) return none;
  const length = page.title.length;
  if (length >= TITLE_LENGTH.min && length <= TITLE_LENGTH.max) return none;
  return [
    createFinding(
      "title-length",
      page,
      "warning",
      `Title is ${length} characters (recommended ${TITLE_LENGTH.min}-${TITLE_LENGTH.max}).`,
      page.title
    ),
  ];
});

const metaDescriptionMissing = pageCheck("meta-description-missing", "Page has a meta description", (page) =>
  page.meta.description
    ? none
    : [createFinding("meta-description-missing", page, "warning", "Page has no meta description.")]
);

const metaDescriptionLength = pageCheck(
  "meta-description-length",
  "Meta description length is within snippet limits",
  (page) => {
    const description = page.meta.description;
    if (!description) return none;
    const length = description.length;
    if (length >= DESCRIPTION_LENGTH.min && length <= DESCRIPTION_LENGTH.max) return none;
    return [
      createFinding(
        "meta-description-length",
        page,
        "info",
        `Meta description is ${length} characters (recommended ${DESCRIPTION_LENGTH.min}-${DESCRIPTION_LENGTH.max}).`,
        description
      ),
    ];
  }
);

const h1Missing = pageCheck("h1-missing", "Page has an H1 heading", (page) =>
  page.meta.h1.length > 0 ? none : [createFinding("h1-missing", page, "warning", "Page has no H1 heading.")]
);

const h1Multiple = pageCheck("h1-multiple", "Page has a single H1 heading", (page) => {
  const count = page.meta.h1.length;
  if (count <= 1) return none;
  return [createFinding("h1-multiple", page, "info", `Page has ${count} H1 headings.`, excerpt(page.meta.h1))];
});

const headingHierarchy = pageCheck("heading-hierarchy", "Heading levels do not skip", (page) => {
  const skips: string[] = [];
  const { headings } = page.meta;
  for (let i = 1; i < headings.length; i++) {
    if (headings[i].level - headings[i - 1].level > 1) {
      skips.push(`H${headings[i - 1].level} -> H${headings[i].level}`);
    }
  }
  if (skips.length === 0) return none;
  return [
    createFinding(
      "heading-hierarchy",
      page,
      "info",
      `Heading levels skip ${skips.length} time(s).`,
      excerpt(skips)
    ),
  ];
});

const canonicalMissing = pageCheck("canonical-missing", "Page declares a canonical URL", (page) =>
  page.meta.canonical
    ? none
    : [createFinding("canonical-missing", page, "info", "Page has no canonical link.")]
);

const viewportMissing = pageCheck("viewport-missing", "Page has a viewport meta tag", (page) =>
  page.meta.viewport
    ? none
    : [createFinding("viewport-missing", page, "warning", "Page has no viewport meta tag.")]
);

const langMissing = pageCheck("lang-missing", "Document declares its language", (page) =>
  page.meta.lang
    ? none
    : [createFinding("lang-missing", page, "info", "The <html> element has no lang attribute.")]
);

const noindex = pageCheck("noindex", "Page is indexable", (page) => {
  const robots = page.meta.robots;
  if (!robots || !/\b(noindex|none)\b/i.test(robots)) return none;
  return [createFinding("noindex", page, "critical", "Page is excluded from indexing by its robots meta tag.", robots)];
});

const imagesMissingAlt = pageCheck("images-missing-alt", "Images carry alt text", (page) => {
  const missing = page.meta.imagesWithoutAlt;
  if (missing.length === 0) return none;
  return [
    createFinding(
      "images-missing-alt",
      page,
      "warning",
      `${missing.length} of ${page.meta.imageCount} images have no alt attribute.`,
      excerpt(missing)
    ),
  ];
});

const thinContent = pageCheck("thin-content", "Page has enough visible text", (page) => {
  const words = page.meta.wordCount;
  if (words >= THIN_CONTENT_WORDS) return none;
  return [createFinding("thin-content", page, "warning", `Page has only ${words} words of visible text.`)];
});

const structuredDataMissing = pageCheck("structured-data-missing", "Page carries JSON-LD structured data", (page) =>
  page.meta.jsonLdTypes.length > 0
    ? none
    : [createFinding("structured-data-missing", page, "info", "No JSON-LD structured data found.")]
);

const openGraphMissing = pageCheck("open-graph-missing", "Page has Open Graph title, description and image", (page) => {
  const { openGraph } = page.meta;
  const missing = [
    openGraph.title ? null : "og:title",
    openGraph.description ? null : "og:description",
    openGraph.image ? null : "og:image",
  ].filter((tag): tag is string => tag !== null);
  if (missing.length === 0) return none;
  return [createFinding("open-graph-missing", page, "info", `Open Graph tags missing: ${missing.join(", ")}.`)];
});

const mixedContent = pageCheck("mixed-content", "HTTPS pages load no HTTP sub-resources", (page) => {
  const insecure = page.meta.insecureResources;
  if (insecure.length === 0) return none;
  return [
    createFinding(
      "mixed-content",
      page,
      "critical",
      `${insecure.length} resource(s) load over plain HTTP on an HTTPS page.`,
      excerpt(insecure)
    ),
  ];
});

/** Registration order is report order within a page. */
export const PAGE_RULES: readonly PageCheck[] = [
  titleMissing,
  titleLength,
  metaDescriptionMissing,
  metaDescriptionLength,
  h1Missing,
  h1Multiple,
  headingHierarchy,
  canonicalMissing,
  viewportMissing,
  langMissing,
  noindex,
  imagesMissingAlt,
  thinContent,
  structuredDataMissing,
  openGraphMissing,
  mixedContent,
];
