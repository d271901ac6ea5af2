// ============================================================================
// Spans and Regions
// ============================================================================

/** Half-open character range: `start` inclusive, `end` exclusive. */
export type Span = {
  start: number;
  end: number;
};

export type RegionKind = "property-drawer" | "drawer";

/**
 * A drawer located in the current parse. Recomputed on every tidy pass and
 * discarded afterwards; annotations created for it outlive it.
 */
export type Region = Span & {
  kind: RegionKind;
  /** `PROPERTIES` for property drawers, the drawer name otherwise */
  name: string;
  /** True iff the drawer begins at offset 0 (document-level metadata) */
  isTopmost: boolean;
};

// ============================================================================
// Annotation Primitive
// ============================================================================

/** Which destructive edit a boundary guard stands against */
export type GuardPolicy = "backward-delete" | "forward-delete";

export type RenderSpec =
  | { kind: "hide" }
  | { kind: "glyph"; text: string }
  | { kind: "side-marker"; bitmap: string }
  | { kind: "input-intercept"; policy: GuardPolicy };

/**
 * Opaque reference to an annotation living in the host. Only the host that
 * issued it can resolve it.
 */
export type AnnotationHandle = {
  readonly id: string;
};

/** Editor-side primitive the engine draws through. */
export interface AnnotationHost {
  createAnnotation(span: Span, spec: RenderSpec): AnnotationHandle;
  removeAnnotation(handle: AnnotationHandle): void;
}

// ============================================================================
// Registry Records
// ============================================================================

export type DecorationKind = "visual" | "boundary-guard";

export type DecorationRecord = {
  kind: DecorationKind;
  /** Span at creation time; the host may have mapped it since */
  span: Span;
  handle: AnnotationHandle;
};

// ============================================================================
// Protected Edits
// ============================================================================

export type ProtectedEditEvent = {
  /** Policy of the guard that refused the edit */
  policy: GuardPolicy;
  /** Guard span at the time of the refusal */
  span: Span;
  handleId: string;
  message: string;
};

export const PROTECTED_REGION_MESSAGE = "Protected region";
