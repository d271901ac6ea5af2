import type { TidyConfig } from "../config";
import { locateRegions } from "../locator/regionLocator";
import type { DocumentTree } from "../parser/types";
import type { DecorationRegistry } from "../registry/decorationRegistry";
import { renderSpecForAction, requiresGuards, resolveStyleAction } from "../style/styleResolver";
import type { AnnotationHost, Region, Span } from "../types";

export type DecoratorContext = {
  registry: DecorationRegistry;
  host: AnnotationHost;
};

export type TidyReport = {
  /** Regions the locator produced */
  regions: number;
  /** Regions that received a visual annotation this pass */
  decorated: number;
  /** Regions already covered by a registered visual record */
  skipped: number;
  /** Annotations created this pass, guards included */
  created: number;
};

/**
 * Span the visual annotation covers. A non-topmost drawer shifts one
 * character inward on both ends: it swallows the newline ending the heading
 * line and leaves its own trailing newline visible.
 */
export function overlaySpan(region: Region): Span {
  if (region.isTopmost) {
    return { start: 0, end: region.end };
  }
  return { start: region.start - 1, end: region.end - 1 };
}

/** One-character spans guarding the trailing and leading fences of a drawer */
export function guardSpans(region: Region): { backward: Span; forward: Span } {
  const before = Math.max(0, region.start - 1);
  return {
    backward: { start: region.end - 1, end: region.end },
    forward: { start: before, end: before + 1 },
  };
}

/**
 * Decorate every drawer of `tree` not yet covered by the registry.
 * Never mutates text; running it again over the same tree creates nothing.
 */
export function tidy(context: DecoratorContext, tree: DocumentTree, config: TidyConfig): TidyReport {
  const { registry, host } = context;
  const report: TidyReport = { regions: 0, decorated: 0, skipped: 0, created: 0 };

  for (const region of locateRegions(tree, { generalDrawers: config.generalDrawers })) {
    report.regions++;
    const span = overlaySpan(region);
    if (registry.exists(span)) {
      report.skipped++;
      continue;
    }

    const action = resolveStyleAction(
      { isTopmost: region.isTopmost, topStyle: config.topStyle, generalStyle: config.generalStyle },
      config
    );
    const spec = renderSpecForAction(action);
    if (!spec) {
      continue;
    }

    registry.add({ kind: "visual", span, handle: host.createAnnotation(span, spec) });
    report.decorated++;
    report.created++;

    if (!requiresGuards(action, config.protectBoundaries)) {
      continue;
    }

    const guards = guardSpans(region);
    registry.add({
      kind: "boundary-guard",
      span: guards.backward,
      handle: host.createAnnotation(guards.backward, {
        kind: "input-intercept",
        policy: "backward-delete",
      }),
    });
    registry.add({
      kind: "boundary-guard",
      span: guards.forward,
      handle: host.createAnnotation(guards.forward, {
        kind: "input-intercept",
        policy: "forward-delete",
      }),
    });
    report.created += 2;
  }

  return report;
}
