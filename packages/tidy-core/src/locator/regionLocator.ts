import type { GeneralDrawerOptions } from "../config";
import { mapNodes, walkNodes } from "../parser/outlineParser";
import type { DocumentTree, DrawerNode, OutlineNode } from "../parser/types";
import type { Region } from "../types";

export type RegionLocatorOptions = {
  generalDrawers?: GeneralDrawerOptions;
};

const normalizeName = (name: string) => name.toUpperCase();

function acceptsDrawer(node: DrawerNode, options: GeneralDrawerOptions): boolean {
  const name = normalizeName(node.name);
  const listed = (entries: string[]) => entries.some((entry) => normalizeName(entry) === name);
  if (options.include.length > 0 && !listed(options.include)) {
    return false;
  }
  return !listed(options.exclude);
}

function toRegion(node: OutlineNode, general: GeneralDrawerOptions | undefined): Region | null {
  switch (node.type) {
    case "property-drawer":
      return {
        kind: "property-drawer",
        name: "PROPERTIES",
        start: node.span.start,
        end: node.span.end,
        isTopmost: node.span.start === 0,
      };
    case "drawer":
      if (!general?.enabled || !acceptsDrawer(node, general)) {
        return null;
      }
      return {
        kind: "drawer",
        name: node.name,
        start: node.span.start,
        end: node.span.end,
        isTopmost: node.span.start === 0,
      };
    case "heading":
      return null;
  }
}

function* walkRegions(tree: DocumentTree, options: RegionLocatorOptions): Generator<Region> {
  const general = options.generalDrawers;
  const nodes: Iterable<OutlineNode> = general?.enabled
    ? walkNodes(tree)
    : mapNodes(tree, "property-drawer");
  for (const node of nodes) {
    const region = toRegion(node, general);
    if (region) {
      yield region;
    }
  }
}

/**
 * Drawers of a parsed document as Regions, in document order.
 * The result can be iterated any number of times; each iteration walks the
 * tree again and copies offsets verbatim.
 */
export function locateRegions(
  tree: DocumentTree,
  options: RegionLocatorOptions = {}
): Iterable<Region> {
  return {
    [Symbol.iterator]: () => walkRegions(tree, options),
  };
}
