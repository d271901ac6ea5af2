import {
  getLogger,
  type GuardPolicy,
  PROTECTED_REGION_MESSAGE,
  type ProtectedEditEvent,
  type RenderSpec,
  type Span,
  type TidyLogger,
} from "@tidyfold/core";
import { keydownHandler } from "prosemirror-keymap";
import type { Node as PMNode } from "prosemirror-model";
import { type Command, type EditorState, Plugin, PluginKey, type Transaction } from "prosemirror-state";
import type { StepMap } from "prosemirror-transform";
import { Decoration, DecorationSet } from "prosemirror-view";

// ============================================================================
// Types
// ============================================================================

export type TidyLayerState = {
  decorations: DecorationSet;
  /** The document changed since the last annotation was added or removed */
  stale: boolean;
};

export type TidyLayerAction =
  | { type: "add"; id: string; span: Span; spec: RenderSpec }
  | { type: "remove"; id: string };

export type TidyLayerOptions = {
  /** Called synchronously whenever an edit is refused */
  onProtectedEdit?: (event: ProtectedEditEvent) => void;
  logger?: TidyLogger;
};

/** A guard decoration resolved against the current document */
export type ActiveGuard = {
  id: string;
  policy: GuardPolicy;
  from: number;
  to: number;
};

export const tidyLayerKey = new PluginKey<TidyLayerState>("tidy-layer");

/** Set to `true` on a transaction that may rewrite guarded characters */
export const ALLOW_PROTECTED_EDIT_META = "tidy-allow-protected-edit" as const;

const HIDDEN_ATTRS = { class: "tidy-hidden", style: "display: none" };

// ============================================================================
// Decoration Builders
// ============================================================================

function createGlyphElement(text: string): HTMLElement {
  const el = document.createElement("span");
  el.className = "tidy-symbol";
  el.setAttribute("aria-label", "Hidden drawer");
  el.textContent = text;
  return el;
}

function createMarkerElement(bitmap: string): HTMLElement {
  const el = document.createElement("span");
  el.className = `tidy-fringe tidy-fringe--${bitmap}`;
  el.setAttribute("data-bitmap", bitmap);
  el.setAttribute("aria-hidden", "true");
  return el;
}

/**
 * Decorations drawn for one annotation. Every decoration carries the
 * annotation id in its spec so removal can find them all.
 */
export function buildAnnotationDecorations(id: string, span: Span, spec: RenderSpec): Decoration[] {
  const { start, end } = span;
  switch (spec.kind) {
    case "hide":
      return [Decoration.inline(start, end, HIDDEN_ATTRS, { annotationId: id })];
    case "glyph":
      return [
        Decoration.inline(start, end, HIDDEN_ATTRS, { annotationId: id }),
        Decoration.widget(start, () => createGlyphElement(spec.text), {
          annotationId: id,
          key: `${id}:glyph:${spec.text}`,
          side: -1,
        }),
      ];
    case "side-marker":
      return [
        Decoration.inline(start, end, HIDDEN_ATTRS, { annotationId: id }),
        Decoration.widget(start, () => createMarkerElement(spec.bitmap), {
          annotationId: id,
          key: `${id}:marker:${spec.bitmap}`,
          side: -1,
          marks: [],
        }),
      ];
    case "input-intercept":
      return [
        Decoration.inline(
          start,
          end,
          { class: "tidy-guard", "data-guard": spec.policy },
          { annotationId: id, guard: spec.policy }
        ),
      ];
  }
}

function applyAction(set: DecorationSet, action: TidyLayerAction, doc: PMNode): DecorationSet {
  switch (action.type) {
    case "add":
      return set.add(doc, buildAnnotationDecorations(action.id, action.span, action.spec));
    case "remove":
      return set.remove(set.find(undefined, undefined, (spec) => spec.annotationId === action.id));
  }
}

/** Whether annotations were mapped through edits since they were drawn */
export function isTidyLayerStale(state: EditorState): boolean {
  return tidyLayerKey.getState(state)?.stale ?? false;
}

// ============================================================================
// Guard Lookup
// ============================================================================

function isGuardPolicy(value: unknown): value is GuardPolicy {
  return value === "backward-delete" || value === "forward-delete";
}

function toActiveGuard(decoration: Decoration): ActiveGuard | null {
  const { annotationId, guard } = decoration.spec;
  if (typeof annotationId !== "string" || !isGuardPolicy(guard)) {
    return null;
  }
  return { id: annotationId, policy: guard, from: decoration.from, to: decoration.to };
}

/** Guards whose span overlaps `[from, to)` in document order, optionally limited to one policy */
export function findGuards(
  state: EditorState,
  from?: number,
  to?: number,
  policy?: GuardPolicy
): ActiveGuard[] {
  const layer = tidyLayerKey.getState(state);
  if (!layer) {
    return [];
  }
  const guards: ActiveGuard[] = [];
  for (const decoration of layer.decorations.find(from, to, (spec) => spec.guard !== undefined)) {
    const guard = toActiveGuard(decoration);
    if (!guard || (policy && guard.policy !== policy)) {
      continue;
    }
    // find() also returns decorations that merely touch the range
    if (from !== undefined && to !== undefined && !(guard.from < to && guard.to > from)) {
      continue;
    }
    guards.push(guard);
  }
  return guards.sort((a, b) => a.from - b.from);
}

function deletedRanges(map: StepMap): Array<[number, number]> {
  const deleted: Array<[number, number]> = [];
  map.forEach((oldStart, oldEnd) => {
    if (oldEnd > oldStart) {
      deleted.push([oldStart, oldEnd]);
    }
  });
  return deleted;
}

/**
 * First guard a transaction would delete from, walking its steps in order and
 * mapping guard positions forward as it goes. Pure insertions never hit.
 */
export function findGuardViolation(tr: Transaction, guards: ActiveGuard[]): ActiveGuard | null {
  let current = guards;
  for (const map of tr.mapping.maps) {
    for (const [start, end] of deletedRanges(map)) {
      const hit = current.find((guard) => start < guard.to && end > guard.from);
      if (hit) {
        return hit;
      }
    }
    current = current.map((guard) => ({
      ...guard,
      from: map.map(guard.from, 1),
      to: map.map(guard.to, -1),
    }));
  }
  return null;
}

// ============================================================================
// Protected Edit Reporting
// ============================================================================

export type ProtectedEditReporter = (guard: ActiveGuard) => void;

export function createProtectedEditReporter(options: TidyLayerOptions = {}): ProtectedEditReporter {
  const logger = (options.logger ?? getLogger()).child({ module: "tidy-layer" });
  return (guard) => {
    const event: ProtectedEditEvent = {
      policy: guard.policy,
      span: { start: guard.from, end: guard.to },
      handleId: guard.id,
      message: PROTECTED_REGION_MESSAGE,
    };
    logger.debug("Protected edit refused", { ...event });
    options.onProtectedEdit?.(event);
  };
}

// ============================================================================
// Guarded Delete Commands
// ============================================================================

/**
 * Backspace over a guarded character: refuses the deletion and reports it.
 * Falls through (returns false) whenever no backward-delete guard is hit.
 */
export function guardedDeleteBackward(report: ProtectedEditReporter = () => {}): Command {
  return (state) => {
    const { empty, from } = state.selection;
    if (!empty || from === 0) {
      return false;
    }
    const [guard] = findGuards(state, from - 1, from, "backward-delete");
    if (!guard) {
      return false;
    }
    report(guard);
    return true;
  };
}

/** Forward delete over a guarded character */
export function guardedDeleteForward(report: ProtectedEditReporter = () => {}): Command {
  return (state) => {
    const { empty, from } = state.selection;
    if (!empty || from >= state.doc.content.size) {
      return false;
    }
    const [guard] = findGuards(state, from, from + 1, "forward-delete");
    if (!guard) {
      return false;
    }
    report(guard);
    return true;
  };
}

// ============================================================================
// Plugin
// ============================================================================

/**
 * Holds tidy annotations as decorations mapped through every edit, and
 * refuses transactions that would delete a guarded character.
 */
export function createTidyLayerPlugin(options: TidyLayerOptions = {}): Plugin<TidyLayerState> {
  const report = createProtectedEditReporter(options);
  const handleKeyDown = keydownHandler({
    Backspace: guardedDeleteBackward(report),
    "Mod-Backspace": guardedDeleteBackward(report),
    Delete: guardedDeleteForward(report),
    "Mod-Delete": guardedDeleteForward(report),
    "Ctrl-d": guardedDeleteForward(report),
  });

  return new Plugin<TidyLayerState>({
    key: tidyLayerKey,

    state: {
      init() {
        return { decorations: DecorationSet.empty, stale: false };
      },

      apply(tr, state) {
        const action = tr.getMeta(tidyLayerKey) as TidyLayerAction | undefined;
        const mapped = tr.docChanged ? state.decorations.map(tr.mapping, tr.doc) : state.decorations;
        if (!action) {
          const stale = state.stale || tr.docChanged;
          return mapped === state.decorations && stale === state.stale
            ? state
            : { decorations: mapped, stale };
        }
        return { decorations: applyAction(mapped, action, tr.doc), stale: false };
      },
    },

    filterTransaction(tr, state) {
      if (!tr.docChanged || tr.getMeta(ALLOW_PROTECTED_EDIT_META) === true) {
        return true;
      }
      const guards = findGuards(state);
      if (guards.length === 0) {
        return true;
      }
      const hit = findGuardViolation(tr, guards);
      if (!hit) {
        return true;
      }
      report(hit);
      return false;
    },

    props: {
      decorations(state) {
        return tidyLayerKey.getState(state)?.decorations ?? DecorationSet.empty;
      },
      handleKeyDown,
    },
  });
}
