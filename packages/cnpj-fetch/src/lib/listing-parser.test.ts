import { describe, it, expect } from "vitest";
import {
  extractMatches,
  FILE_PATTERN,
  FOLDER_PATTERN,
  isFolderToken,
  regexListingParser,
} from "./listing-parser.js";

function indexPage(hrefs: string[]): string {
  return [
    "<html><body><h1>Index of /dados</h1><pre>",
    '<a href="../">Parent Directory</a>',
    ...hrefs.map((href) => `<a href="${href}">${href}</a>   2024-07-14 10:02  120M`),
    "</pre></body></html>",
  ].join("\n");
}

describe("extractMatches", () => {
  it("returns the capture group of every match in order", () => {
    const html = indexPage(["2023-05/", "2024-12/", "2024-01/"]);
    expect(extractMatches(html, FOLDER_PATTERN)).toEqual(["2023-05", "2024-12", "2024-01"]);
  });

  it("drops exact duplicates and keeps the first occurrence", () => {
    const html = indexPage(["a.zip", "b.txt", "a.zip"]);
    expect(extractMatches(html, FILE_PATTERN)).toEqual(["a.zip", "b.txt"]);
  });

  it("returns an empty array when nothing matches", () => {
    expect(extractMatches("", FOLDER_PATTERN)).toEqual([]);
    expect(extractMatches("<html><body>maintenance</body></html>", FILE_PATTERN)).toEqual([]);
  });

  it("tolerates truncated markup", () => {
    const html = '<pre><a href="2024-02/">2024-02/</a>\n<a href="2024-03/">2024-';
    expect(extractMatches(html, FOLDER_PATTERN)).toEqual(["2024-02", "2024-03"]);
  });

  it("does not depend on the global flag or lastIndex of the given pattern", () => {
    const pattern = /href="(\d{4}-\d{2})\/"/;
    const html = indexPage(["2024-01/", "2024-02/"]);
    expect(extractMatches(html, pattern)).toEqual(["2024-01", "2024-02"]);
    expect(extractMatches(html, pattern)).toEqual(["2024-01", "2024-02"]);
  });

  it("rejects a pattern with more than one capturing group", () => {
    expect(() => extractMatches("", /href="(.*?\.(zip|txt))"/g)).toThrow(TypeError);
  });

  it("rejects a pattern without a capturing group", () => {
    expect(() => extractMatches("", /href="[^"]*"/g)).toThrow(
      "Listing pattern must have exactly one capturing group, found 0"
    );
  });
});

describe("FOLDER_PATTERN", () => {
  it("matches only zero-padded year-month folders", () => {
    const html = indexPage(["2024-07/", "2024-7/", "temp/", "2024-08", "2024-09/"]);
    expect(regexListingParser.parseFolders(html)).toEqual(["2024-07", "2024-09"]);
  });
});

describe("FILE_PATTERN", () => {
  it("matches .zip and .txt hrefs", () => {
    const html = indexPage(["Empresas0.zip", "LAYOUT.txt", "Socios1.zip", "readme.pdf"]);
    expect(regexListingParser.parseFiles(html)).toEqual([
      "Empresas0.zip",
      "LAYOUT.txt",
      "Socios1.zip",
    ]);
  });

  it("is case sensitive on the extension", () => {
    const html = indexPage(["UPPER.ZIP", "notes.Txt", "lower.zip"]);
    expect(regexListingParser.parseFiles(html)).toEqual(["lower.zip"]);
  });

  it("ignores names that only contain the extension", () => {
    const html = indexPage(["backup.zip.old"]);
    expect(regexListingParser.parseFiles(html)).toEqual([]);
  });

  it("spans anchors written on the same line", () => {
    const html = '<a href="docs/">docs/</a> <a href="b.zip">b.zip</a>';
    expect(regexListingParser.parseFiles(html)).toEqual(['docs/">docs/</a> <a href="b.zip']);
  });
});

describe("isFolderToken", () => {
  it("accepts yyyy-mm only", () => {
    expect(isFolderToken("2024-07")).toBe(true);
    expect(isFolderToken("2024-7")).toBe(false);
    expect(isFolderToken("2024-07/")).toBe(false);
    expect(isFolderToken("latest")).toBe(false);
  });
});
