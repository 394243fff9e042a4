import { describe, it, expect } from "vitest";
import { toOutputPath, relativeHref, rootPrefix, isInside } from "./paths";

describe("toOutputPath", () => {
  it("replaces the extension and keeps directories", () => {
    expect(toOutputPath("2024/hello.md", ".html")).toBe("2024/hello.html");
  });

  it("handles files at the root", () => {
    expect(toOutputPath("hello.md", ".html")).toBe("hello.html");
  });

  it("keeps dots inside the base name", () => {
    expect(toOutputPath("notes/v1.2-release.md", ".htm")).toBe(
      "notes/v1.2-release.htm",
    );
  });
});

describe("relativeHref", () => {
  it("links from the root", () => {
    expect(relativeHref("hello.html", "style/tailwind.css")).toBe(
      "style/tailwind.css",
    );
  });

  it("climbs out of nested pages", () => {
    expect(relativeHref("2024/hello.html", "style/tailwind.css")).toBe(
      "../style/tailwind.css",
    );
  });

  it("links between siblings", () => {
    expect(relativeHref("2024/a.html", "2024/b.html")).toBe("b.html");
  });

  it("links across directories", () => {
    expect(relativeHref("2023/a.html", "2024/b.html")).toBe("../2024/b.html");
  });
});

describe("rootPrefix", () => {
  it("is empty at the root", () => {
    expect(rootPrefix("hello.html")).toBe("");
  });

  it("climbs one level per directory", () => {
    expect(rootPrefix("2024/01/hello.html")).toBe("../../");
  });
});

describe("isInside", () => {
  it("detects nested directories", () => {
    expect(isInside("/blog/posts/_site", "/blog/posts")).toBe(true);
  });

  it("treats a directory as inside itself", () => {
    expect(isInside("/blog/posts", "/blog/posts")).toBe(true);
  });

  it("rejects siblings", () => {
    expect(isInside("/blog/site", "/blog/posts")).toBe(false);
  });
});
