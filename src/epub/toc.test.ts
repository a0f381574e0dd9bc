import { describe, it, expect } from "vitest";
import { shortenNavTitles, shortenNcxTitles } from "./toc";
import { SAMPLE_NCX } from "../test-utils/epub";

describe("shortenNcxTitles", () => {
  it("should shorten nav labels and count the changes", () => {
    const result = shortenNcxTitles(SAMPLE_NCX, 50);

    expect(result.changed).toBe(1);
    expect(result.xml).toContain("<text>Stocks Rally as Fed Holds Rates</text>");
    expect(result.xml).toContain("<text>Markets Today</text>");
  });

  it("should keep the xml declaration", () => {
    const result = shortenNcxTitles(SAMPLE_NCX, 50);

    expect(result.xml.startsWith('<?xml version="1.0" encoding="utf-8"?>')).toBe(true);
  });

  it("should report no changes when every title already fits", () => {
    const ncx = `<ncx><navMap><navPoint><navLabel><text>Brief</text></navLabel></navPoint></navMap></ncx>`;

    const result = shortenNcxTitles(ncx, 50);

    expect(result.changed).toBe(0);
    expect(result.xml).toBe(ncx);
  });
});

describe("shortenNavTitles", () => {
  it("should shorten plain-text links only", () => {
    const nav = `<nav><ol><li><a href="a1.html">Oil Prices Slide | Bloomberg</a></li><li><a href="a2.html"><span>Wrapped - Bloomberg</span></a></li></ol></nav>`;

    const result = shortenNavTitles(nav, 50);

    expect(result.changed).toBe(1);
    expect(result.xml).toBe(
      `<nav><ol><li><a href="a1.html">Oil Prices Slide</a></li><li><a href="a2.html"><span>Wrapped - Bloomberg</span></a></li></ol></nav>`,
    );
  });
});
