import {
  type AnnotationHandle,
  type AnnotationHost,
  type RenderSpec,
  type Span,
  TidyError,
} from "@tidyfold/core";
import type { EditorState, Transaction } from "prosemirror-state";

import { type TidyLayerAction, tidyLayerKey } from "./tidyLayer";

/** Anything that owns an editor state and applies transactions to it; an EditorView qualifies */
export interface TransactionTarget {
  readonly state: EditorState;
  dispatch(tr: Transaction): void;
}

/** Headless target: applies each transaction to the held state */
export class StateHolder implements TransactionTarget {
  constructor(public state: EditorState) {}

  dispatch(tr: Transaction): void {
    this.state = this.state.apply(tr);
  }
}

/**
 * Draws annotations into the tidy layer plugin of a ProseMirror state.
 * Each create or remove dispatches one meta transaction kept out of history.
 */
export class ProseMirrorAnnotationHost implements AnnotationHost {
  private readonly live = new Set<string>();
  private nextId = 1;

  constructor(
    private readonly target: TransactionTarget,
    private readonly prefix = "tidy"
  ) {}

  get size(): number {
    return this.live.size;
  }

  createAnnotation(span: Span, spec: RenderSpec): AnnotationHandle {
    const state = this.target.state;
    if (!tidyLayerKey.getState(state)) {
      throw new TidyError("LAYER_NOT_INSTALLED", "Tidy layer plugin is not installed in this state");
    }
    const size = state.doc.content.size;
    if (span.start < 0 || span.end < span.start || span.end > size) {
      throw new TidyError(
        "SPAN_OUT_OF_RANGE",
        `Span [${span.start}, ${span.end}) outside document of size ${size}`,
        { context: { span, size } }
      );
    }

    const id = `${this.prefix}-${this.nextId++}`;
    this.dispatch({ type: "add", id, span: { ...span }, spec });
    this.live.add(id);
    return { id };
  }

  removeAnnotation(handle: AnnotationHandle): void {
    if (!this.live.delete(handle.id)) {
      throw new TidyError("UNKNOWN_ANNOTATION", `No annotation ${handle.id}`, {
        context: { handleId: handle.id },
      });
    }
    this.dispatch({ type: "remove", id: handle.id });
  }

  private dispatch(action: TidyLayerAction): void {
    const tr = this.target.state.tr.setMeta(tidyLayerKey, action).setMeta("addToHistory", false);
    this.target.dispatch(tr);
  }
}
