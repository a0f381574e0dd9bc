// pattern: Functional Core
import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";

export type OpfDocument = {
  readonly $: CheerioAPI;
};

export type ManifestItem = {
  readonly id: string;
  readonly href: string;
  readonly mediaType: string;
};

// Packages are usually written with a default namespace, but some producers
// prefix every element with `opf:`.
const MANIFEST = "manifest, opf\\:manifest";
const SPINE = "spine, opf\\:spine";
const ITEM = "item, opf\\:item";
const ITEMREF = "itemref, opf\\:itemref";

export function parseOpf(xml: string): OpfDocument {
  return { $: cheerio.load(xml, { xml: true }) };
}

export function serializeOpf(opf: OpfDocument): string {
  return opf.$.xml();
}

export function hasSpine(opf: OpfDocument): boolean {
  return opf.$(SPINE).length > 0;
}

export function spineIdrefs(opf: OpfDocument): Array<string> {
  const { $ } = opf;
  return $(SPINE)
    .first()
    .children(ITEMREF)
    .map((_, el) => $(el).attr("idref") ?? "")
    .get();
}

/**
 * Drops the spine itemrefs at the given positions and returns their idrefs.
 * Out-of-range positions are ignored.
 */
export function removeSpineItems(
  opf: OpfDocument,
  positions: ReadonlyArray<number>,
): Array<string> {
  const { $ } = opf;
  const wanted = new Set(positions);
  const removed: Array<string> = [];

  $(SPINE)
    .first()
    .children(ITEMREF)
    .each((index, el) => {
      if (wanted.has(index)) {
        removed.push($(el).attr("idref") ?? "");
        $(el).remove();
      }
    });

  return removed;
}

export function manifestItems(opf: OpfDocument): Array<ManifestItem> {
  const { $ } = opf;
  return $(MANIFEST)
    .first()
    .children(ITEM)
    .map((_, el) => ({
      id: $(el).attr("id") ?? "",
      href: $(el).attr("href") ?? "",
      mediaType: $(el).attr("media-type") ?? "",
    }))
    .get();
}

/**
 * Removes manifest entries matching `predicate` and returns how many went.
 */
export function removeManifestItems(
  opf: OpfDocument,
  predicate: (item: ManifestItem) => boolean,
): number {
  const { $ } = opf;
  let removed = 0;

  $(MANIFEST)
    .first()
    .children(ITEM)
    .each((_, el) => {
      const node = $(el);
      const item = {
        id: node.attr("id") ?? "",
        href: node.attr("href") ?? "",
        mediaType: node.attr("media-type") ?? "",
      };
      if (predicate(item)) {
        node.remove();
        removed += 1;
      }
    });

  return removed;
}

export function addManifestItem(opf: OpfDocument, item: ManifestItem): void {
  const { $ } = opf;
  const manifest = $(MANIFEST).first();
  const name = manifest.get(0)?.name ?? "manifest";
  const prefix = name.includes(":") ? `${name.split(":")[0]}:` : "";

  const node = $(`<${prefix}item/>`);
  node.attr("id", item.id);
  node.attr("href", item.href);
  node.attr("media-type", item.mediaType);
  manifest.append(node);
}
