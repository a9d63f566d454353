import { describe, it, expect } from "vitest";
import { getHost, hostForFilename, normalizeUrl } from "../server/audit/url-utils";

describe("normalizeUrl", () => {
  it("lowercases scheme and host and drops the default port", () => {
    expect(normalizeUrl("HTTPS://Example.COM:443/About")).toBe("https://example.com/About");
    expect(normalizeUrl("http://example.com:80/x")).toBe("http://example.com/x");
  });

  it("keeps non-default ports", () => {
    expect(normalizeUrl("http://example.com:8080/x")).toBe("http://example.com:8080/x");
  });

  it("strips fragments and trailing slashes", () => {
    expect(normalizeUrl("https://example.com/a#section")).toBe("https://example.com/a");
    expect(normalizeUrl("https://example.com/a/")).toBe("https://example.com/a");
    expect(normalizeUrl("https://example.com/")).toBe("https://example.com");
    expect(normalizeUrl("https://example.com")).toBe("https://example.com");
  });

  it("keeps the query string verbatim", () => {
    expect(normalizeUrl("https://example.com/a/?b=1&a=2")).toBe("https://example.com/a?b=1&a=2");
  });

  it("resolves relative links against a base", () => {
    expect(normalizeUrl("../c", "https://example.com/a/b/")).toBe("https://example.com/a/c");
    expect(normalizeUrl("/about", "https://example.com/blog/post")).toBe("https://example.com/about");
  });

  it("rejects non-http schemes and unparsable input", () => {
    expect(normalizeUrl("mailto:hello@example.com")).toBeNull();
    expect(normalizeUrl("javascript:void(0)")).toBeNull();
    expect(normalizeUrl("ftp://example.com/file")).toBeNull();
    expect(normalizeUrl("not a url")).toBeNull();
  });

  it("maps equivalent spellings to the same key", () => {
    const variants = ["https://example.com/docs", "https://EXAMPLE.com/docs/", "https://example.com:443/docs#top"];
    expect(new Set(variants.map((v) => normalizeUrl(v))).size).toBe(1);
  });
});

describe("host helpers", () => {
  it("lowercases hosts and keeps explicit ports", () => {
    expect(getHost("https://EXAMPLE.com/b")).toBe("example.com");
    expect(getHost("nope")).toBeNull();
    expect(getHost("https://example.com:8443/x")).toBe("example.com:8443");
  });

  it("makes hosts safe for file names", () => {
    expect(hostForFilename("http://localhost:8080/x")).toBe("localhost_8080");
    expect(hostForFilename("https://Example.com/")).toBe("example.com");
  });
});
