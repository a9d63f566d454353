import { describe, it, expect } from "vitest";
import { extractPageData } from "../server/audit/extractor";

const PAGE_URL = "https://example.com/widgets";

const HTML = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title> Acme Widgets </title>
  <meta name="Description" content="Widgets for every occasion">
  <link rel="canonical" href="https://example.com/widgets">
  <meta name="robots" content="noindex, follow">
  <meta name="viewport" content="width=device-width">
  <meta property="og:title" content="Acme">
  <script type="application/ld+json">{"@context":"https://schema.org","@type":"Organization","founder":{"@type":"Person","name":"Ada"}}</script>
  <script type="application/ld+json">{not json</script>
  <script src="http://cdn.example.com/lib.js"></script>
  <style>.hidden { display: none; }</style>
</head>
<body>
  <h1>Acme <span>Widgets</span></h1>
  <h3>Details</h3>
  <p>One two<b>three</b></p>
  <img src="/a.png"><img src="/b.png" alt="">
  <a href="/about">About</a>
  <a href="/about/#team">Team</a>
  <a href="https://other.com/x">Other</a>
  <a href="mailto:hi@example.com">Mail</a>
  <script>var hidden = "words that do not count";</script>
</body>
</html>`;

describe("extractPageData", () => {
  const { title, meta, links } = extractPageData(HTML, PAGE_URL);

  it("reads the trimmed title", () => {
    expect(title).toBe("Acme Widgets");
  });

  it("reads head metadata", () => {
    expect(meta.description).toBe("Widgets for every occasion");
    expect(meta.canonical).toBe("https://example.com/widgets");
    expect(meta.robots).toBe("noindex, follow");
    expect(meta.viewport).toBe("width=device-width");
    expect(meta.lang).toBe("en");
    expect(meta.charset).toBe("utf-8");
    expect(meta.openGraph).toEqual({ title: "Acme", description: null, image: null });
  });

  it("collects headings in document order", () => {
    expect(meta.h1).toEqual(["Acme Widgets"]);
    expect(meta.headings).toEqual([
      { level: 1, text: "Acme Widgets" },
      { level: 3, text: "Details" },
    ]);
  });

  it("counts images without an alt attribute", () => {
    expect(meta.imageCount).toBe(2);
    expect(meta.imagesWithoutAlt).toEqual(["/a.png"]);
  });

  it("collects nested JSON-LD types and ignores broken blocks", () => {
    expect(meta.jsonLdTypes).toEqual(["Organization", "Person"]);
  });

  it("flags plain HTTP sub-resources on an HTTPS page", () => {
    expect(meta.insecureResources).toEqual(["http://cdn.example.com/lib.js"]);
  });

  it("counts visible words only", () => {
    // Acme Widgets Details One two three About Team Other Mail
    expect(meta.wordCount).toBe(10);
  });

  it("returns normalized, deduplicated http(s) links", () => {
    expect(links).toEqual(["https://example.com/about", "https://other.com/x"]);
  });
});

describe("extractPageData on sparse pages", () => {
  it("returns nulls and empty lists for a bare document", () => {
    const { title, meta, links } = extractPageData("<html><body></body></html>", "https://example.com");
    expect(title).toBeNull();
    expect(meta.description).toBeNull();
    expect(meta.lang).toBeNull();
    expect(meta.h1).toEqual([]);
    expect(meta.jsonLdTypes).toEqual([]);
    expect(meta.wordCount).toBe(0);
    expect(links).toEqual([]);
  });

  it("does not report mixed content on plain HTTP pages", () => {
    const html = '<html><body><img src="http://cdn.example.com/a.png"></body></html>';
    expect(extractPageData(html, "http://example.com").meta.insecureResources).toEqual([]);
  });

  it("labels images without a src", () => {
    const html = "<html><body><img></body></html>";
    expect(extractPageData(html, "https://example.com").meta.imagesWithoutAlt).toEqual(["(inline image)"]);
  });
});
