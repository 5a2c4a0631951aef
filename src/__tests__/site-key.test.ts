import { describe, it, expect } from "vitest";
import {
  extractDomain,
  normalizeSiteKey,
  registrableDomain,
  siteKeyFileName,
  siteUrl,
} from "../lib/site-key";

describe("normalizeSiteKey", () => {
  it("lowercases and strips www. and trailing slashes", () => {
    expect(normalizeSiteKey("WWW.Ford.com/")).toBe("ford.com");
  });

  it("is idempotent", () => {
    const inputs = ["WWW.Ford.com/", "www.www.example.com//", " Shop.Example.CO.UK ", "ford.com", ""];
    for (const input of inputs) {
      const once = normalizeSiteKey(input);
      expect(normalizeSiteKey(once)).toBe(once);
    }
  });

  it("handles whitespace hidden behind a trailing slash", () => {
    expect(normalizeSiteKey("www.ford.com/ /")).toBe("ford.com");
  });
});

describe("extractDomain", () => {
  it("takes the host of a full URL", () => {
    expect(extractDomain("https://www.Ford.com/dealers?zip=02134")).toBe("ford.com");
  });

  it("treats input without a scheme as a bare domain", () => {
    expect(extractDomain("www.ford.com/dealers")).toBe("ford.com");
    expect(extractDomain("ford.com:8080")).toBe("ford.com");
  });

  it("returns an empty key for empty input", () => {
    expect(extractDomain("")).toBe("");
  });
});

describe("registrableDomain", () => {
  it("keeps the last two labels", () => {
    expect(registrableDomain("shop.dealers.ford.com")).toBe("ford.com");
  });

  it("keeps three labels under a generic second level", () => {
    expect(registrableDomain("www.shop.example.co.uk")).toBe("example.co.uk");
  });
});

describe("siteKeyFileName and siteUrl", () => {
  it("replaces characters that are unsafe in file names", () => {
    expect(siteKeyFileName("a/b:c")).toBe("a_b_c");
    expect(siteKeyFileName("ford.com")).toBe("ford.com");
  });

  it("adds https to bare domains only", () => {
    expect(siteUrl("ford.com")).toBe("https://ford.com");
    expect(siteUrl("http://ford.com/x")).toBe("http://ford.com/x");
  });
});
