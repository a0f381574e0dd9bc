import { randomBytes } from "node:crypto";
import AdmZip from "adm-zip";

export const SAMPLE_OPF = `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="uid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>Morning Briefing</dc:title>
  </metadata>
  <manifest>
    <item id="titlepage" href="titlepage.xhtml" media-type="application/xhtml+xml"/>
    <item id="index" href="index.html" media-type="application/xhtml+xml"/>
    <item id="a1" href="article1.html" media-type="application/xhtml+xml"/>
    <item id="a2" href="article2.html" media-type="application/xhtml+xml"/>
    <item id="photo" href="images/photo.jpg" media-type="image/jpeg"/>
    <item id="cover-image" href="images/cover.jpg" media-type="image/jpeg"/>
    <item id="css" href="stylesheet.css" media-type="text/css"/>
    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>
  </manifest>
  <spine toc="ncx">
    <itemref idref="titlepage"/>
    <itemref idref="index"/>
    <itemref idref="a1"/>
    <itemref idref="a2"/>
  </spine>
</package>`;

export const SAMPLE_NCX = `<?xml version="1.0" encoding="utf-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <navMap>
    <navPoint id="p1"><navLabel><text>Stocks Rally as Fed Holds Rates - Bloomberg</text></navLabel><content src="article1.html"/></navPoint>
    <navPoint id="p2"><navLabel><text>Markets Today</text></navLabel><content src="article2.html"/></navPoint>
  </navMap>
</ncx>`;

export const SAMPLE_ARTICLE = `<html xmlns="http://www.w3.org/1999/xhtml"><head><title>A1</title></head><body><p>Lead paragraph</p><figure><img src="images/photo.jpg"/></figure><img src="images/cover.jpg"/></body></html>`;

const CONTAINER = `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;

/**
 * Writes a toolkit-shaped EPUB to `path`. The photo is random bytes so the
 * archive stays above the minimum input size once compressed.
 */
export function writeTestEpub(
  path: string,
  overrides?: Readonly<Record<string, string | Buffer | null>>,
): void {
  const files: Record<string, string | Buffer | null> = {
    mimetype: "application/epub+zip",
    "META-INF/container.xml": CONTAINER,
    "OEBPS/content.opf": SAMPLE_OPF,
    "OEBPS/toc.ncx": SAMPLE_NCX,
    "OEBPS/titlepage.xhtml": "<html><body><p>Cover</p></body></html>",
    "OEBPS/index.html": "<html><body><p>Sections</p></body></html>",
    "OEBPS/article1.html": SAMPLE_ARTICLE,
    "OEBPS/article2.html": "<html><body><p>Second story</p></body></html>",
    "OEBPS/stylesheet.css": "body { color: red; }",
    "OEBPS/images/photo.jpg": randomBytes(4096),
    "OEBPS/images/cover.jpg": randomBytes(64),
    ...overrides,
  };

  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    if (content === null) {
      continue;
    }
    zip.addFile(name, typeof content === "string" ? Buffer.from(content) : content);
  }
  zip.writeZip(path);
}
