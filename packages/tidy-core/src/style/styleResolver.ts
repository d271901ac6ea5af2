import type { GeneralStyle, TidyConfig, TopStyle } from "../config";
import type { RenderSpec } from "../types";

export type StyleAction =
  | { type: "hide-completely"; guarded: boolean }
  | { type: "no-op" }
  | { type: "show-inline-symbol"; symbol: string }
  | { type: "show-fringe-marker"; bitmap: string };

export type StyleInput = {
  isTopmost: boolean;
  topStyle: TopStyle;
  generalStyle: GeneralStyle;
};

type StyleOptions = Pick<TidyConfig, "inlineSymbol" | "fringeBitmap" | "protectBoundaries">;

const DEFAULT_STYLE_OPTIONS: StyleOptions = {
  inlineSymbol: "♯",
  fringeBitmap: "square",
  protectBoundaries: true,
};

/**
 * Decide how a drawer is tidied.
 *
 * The topmost drawer is either hidden without guards or left alone. Any other
 * drawer is rendered per `generalStyle` and always keeps its fences guarded,
 * including when it is hidden outright.
 */
export function resolveStyleAction(
  input: StyleInput,
  options: Partial<StyleOptions> = {}
): StyleAction {
  const { inlineSymbol, fringeBitmap, protectBoundaries } = { ...DEFAULT_STYLE_OPTIONS, ...options };

  if (input.isTopmost) {
    switch (input.topStyle) {
      case "invisible":
        return { type: "hide-completely", guarded: false };
      case "keep":
        return { type: "no-op" };
    }
  }

  switch (input.generalStyle) {
    case "inline-symbol":
      return { type: "show-inline-symbol", symbol: inlineSymbol };
    case "fringe-marker":
      return { type: "show-fringe-marker", bitmap: fringeBitmap };
    case "invisible":
      return { type: "hide-completely", guarded: protectBoundaries };
  }
}

/** Whether an action wants boundary guards around its drawer */
export function requiresGuards(action: StyleAction, protectBoundaries = true): boolean {
  if (!protectBoundaries) {
    return false;
  }
  switch (action.type) {
    case "hide-completely":
      return action.guarded;
    case "show-inline-symbol":
    case "show-fringe-marker":
      return true;
    case "no-op":
      return false;
  }
}

/** Visual render spec for an action; `null` when nothing is drawn */
export function renderSpecForAction(action: StyleAction): RenderSpec | null {
  switch (action.type) {
    case "hide-completely":
      return { kind: "hide" };
    case "show-inline-symbol":
      return { kind: "glyph", text: action.symbol };
    case "show-fringe-marker":
      return { kind: "side-marker", bitmap: action.bitmap };
    case "no-op":
      return null;
  }
}
