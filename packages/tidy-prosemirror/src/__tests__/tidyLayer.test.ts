import { createTidyLogger, isTidyError, type ProtectedEditEvent, resolveTidyConfig } from "@tidyfold/core";
import { type EditorState, TextSelection } from "prosemirror-state";
import { describe, expect, it, vi } from "vitest";

import { ProseMirrorAnnotationHost, StateHolder } from "../prosemirrorHost";
import { documentText } from "../schema";
import { createProseMirrorTidyMode, createTidyEditorState } from "../tidyEditor";
import {
  ALLOW_PROTECTED_EDIT_META,
  findGuards,
  guardedDeleteBackward,
  guardedDeleteForward,
  isTidyLayerStale,
  tidyLayerKey,
} from "../tidyLayer";

const logger = createTidyLogger({ level: "silent" });

// Heading line [0,100), drawer [100,130), body [130,135)
const HEADING = `* ${"a".repeat(97)}\n`;
const DRAWER = ":PROPERTIES:\n:ID: abcde\n:END:\n";
const TEXT = `${HEADING}${DRAWER}body\n`;

const TOP_TEXT = ":PROPERTIES:\n:ID: top\n:END:\n* H\n";

function setup(text = TEXT, config = resolveTidyConfig()) {
  const onProtectedEdit = vi.fn<(event: ProtectedEditEvent) => void>();
  const holder = new StateHolder(createTidyEditorState(text, { onProtectedEdit, logger }));
  const mode = createProseMirrorTidyMode(holder, { config, logger });
  return { holder, mode, onProtectedEdit };
}

const decorationsOf = (state: EditorState) => tidyLayerKey.getState(state)?.decorations.find() ?? [];

const withCursor = (state: EditorState, pos: number) =>
  state.apply(state.tr.setSelection(TextSelection.create(state.doc, pos)));

describe("tidy layer", () => {
  it("should place the fixture drawer at [100,130)", () => {
    expect(TEXT.indexOf(":PROPERTIES:")).toBe(100);
    expect(TEXT.indexOf("body")).toBe(130);
  });

  it("should hide the drawer one character inward and add a symbol", () => {
    const { holder, mode } = setup();

    mode.enable();

    const decorations = decorationsOf(holder.state);
    const hidden = decorations.filter(
      (decoration) => decoration.spec.annotationId === "tidy-1" && decoration.from !== decoration.to
    );
    const widgets = decorations.filter(
      (decoration) => decoration.spec.annotationId === "tidy-1" && decoration.from === decoration.to
    );
    expect(hidden.map(({ from, to }) => [from, to])).toEqual([[99, 129]]);
    expect(widgets.map(({ from }) => from)).toEqual([99]);
    expect(findGuards(holder.state).map(({ policy, from, to }) => [policy, from, to])).toEqual([
      ["forward-delete", 99, 100],
      ["backward-delete", 129, 130],
    ]);
  });

  it("should leave the document text untouched", () => {
    const { holder, mode } = setup();
    mode.enable();
    expect(documentText(holder.state.doc)).toBe(TEXT);
  });

  it("should reject a backward delete at the end of the drawer", () => {
    const { holder, mode, onProtectedEdit } = setup();
    mode.enable();

    holder.dispatch(holder.state.tr.delete(129, 130));

    expect(documentText(holder.state.doc)).toBe(TEXT);
    expect(onProtectedEdit).toHaveBeenCalledWith({
      policy: "backward-delete",
      span: { start: 129, end: 130 },
      handleId: "tidy-2",
      message: "Protected region",
    });
  });

  it("should reject a range delete that covers a fence", () => {
    const { holder, mode, onProtectedEdit } = setup();
    mode.enable();

    holder.dispatch(holder.state.tr.delete(90, 110));

    expect(documentText(holder.state.doc)).toBe(TEXT);
    expect(onProtectedEdit.mock.calls[0][0].policy).toBe("forward-delete");
  });

  it("should allow insertions at a fence and edits elsewhere", () => {
    const { holder, mode, onProtectedEdit } = setup();
    mode.enable();

    holder.dispatch(holder.state.tr.insertText("x", 130));
    holder.dispatch(holder.state.tr.delete(131, 132));

    expect(documentText(holder.state.doc)).toBe(`${HEADING}${DRAWER}xody\n`);
    expect(onProtectedEdit).not.toHaveBeenCalled();
  });

  it("should map decorations through edits before the drawer", () => {
    const { holder, mode } = setup();
    mode.enable();

    holder.dispatch(holder.state.tr.insertText("zz", 2));

    expect(findGuards(holder.state).map(({ from, to }) => [from, to])).toEqual([
      [101, 102],
      [131, 132],
    ]);
  });

  it("should let flagged transactions through", () => {
    const { holder, mode } = setup();
    mode.enable();

    holder.dispatch(holder.state.tr.delete(129, 130).setMeta(ALLOW_PROTECTED_EDIT_META, true));

    expect(holder.state.doc.content.size).toBe(TEXT.length - 1);
  });

  it("should remove every decoration on disable", () => {
    const { holder, mode } = setup();
    mode.enable();

    mode.disable();

    expect(decorationsOf(holder.state)).toEqual([]);
    holder.dispatch(holder.state.tr.delete(129, 130));
    expect(holder.state.doc.content.size).toBe(TEXT.length - 1);
  });

  it("should not duplicate decorations on save", () => {
    const { holder, mode } = setup();
    mode.enable();
    const count = decorationsOf(holder.state).length;

    mode.handleSave();

    expect(decorationsOf(holder.state)).toHaveLength(count);
    expect(mode.session.registry.size).toBe(3);
  });

  it("should mark the layer stale after an edit", () => {
    const { holder, mode } = setup();
    mode.enable();
    expect(isTidyLayerStale(holder.state)).toBe(false);

    holder.dispatch(holder.state.tr.insertText("zz", 2));

    expect(isTidyLayerStale(holder.state)).toBe(true);
  });

  it("should rebuild rather than stack annotations when saving after an edit", () => {
    const { holder, mode } = setup("* Task\n:PROPERTIES:\n:ID: x\n:END:\nbody\n");
    mode.enable();

    holder.dispatch(holder.state.tr.insertText("zz", 2));
    mode.handleSave();

    const visuals = mode.session.records().filter((record) => record.kind === "visual");
    const widgets = decorationsOf(holder.state).filter((decoration) => decoration.from === decoration.to);
    expect(visuals.map((record) => record.span)).toEqual([{ start: 8, end: 34 }]);
    expect(widgets.map(({ from }) => from)).toEqual([8]);
    expect(decorationsOf(holder.state)).toHaveLength(4);
    expect(findGuards(holder.state).map(({ from, to }) => [from, to])).toEqual([
      [8, 9],
      [34, 35],
    ]);
    expect(isTidyLayerStale(holder.state)).toBe(false);
  });

  it("should hide a topmost drawer without guards", () => {
    const { holder, mode } = setup(TOP_TEXT, resolveTidyConfig({ generalStyle: "invisible" }));
    mode.enable();

    expect(decorationsOf(holder.state).map(({ from, to }) => [from, to])).toEqual([[0, 28]]);
    holder.dispatch(holder.state.tr.delete(27, 28));
    expect(documentText(holder.state.doc)).toBe(":PROPERTIES:\n:ID: top\n:END:* H\n");
  });
});

describe("guarded delete commands", () => {
  it("should refuse backspace right after the drawer", () => {
    const { holder, mode } = setup();
    mode.enable();
    const report = vi.fn();

    const handled = guardedDeleteBackward(report)(withCursor(holder.state, 130));

    expect(handled).toBe(true);
    expect(report).toHaveBeenCalledWith({ id: "tidy-2", policy: "backward-delete", from: 129, to: 130 });
  });

  it("should fall through away from a guard", () => {
    const { holder, mode } = setup();
    mode.enable();

    expect(guardedDeleteBackward()(withCursor(holder.state, 131))).toBe(false);
    expect(guardedDeleteForward()(withCursor(holder.state, 130))).toBe(false);
  });

  it("should refuse forward delete at the end of the heading line", () => {
    const { holder, mode } = setup();
    mode.enable();
    const report = vi.fn();

    expect(guardedDeleteForward(report)(withCursor(holder.state, 99))).toBe(true);
    expect(report).toHaveBeenCalledWith({ id: "tidy-3", policy: "forward-delete", from: 99, to: 100 });
  });

  it("should only answer the matching policy", () => {
    const { holder, mode } = setup();
    mode.enable();

    // Backspace at 100 would delete the forward-delete guard's character
    expect(guardedDeleteBackward()(withCursor(holder.state, 100))).toBe(false);
  });

  it("should ignore non-empty selections", () => {
    const { holder, mode } = setup();
    mode.enable();
    const state = holder.state.apply(
      holder.state.tr.setSelection(TextSelection.create(holder.state.doc, 125, 130))
    );

    expect(guardedDeleteBackward()(state)).toBe(false);
  });
});

describe("ProseMirrorAnnotationHost", () => {
  it("should require the tidy layer plugin", () => {
    const holder = new StateHolder(createTidyEditorState("text"));
    const bare = new StateHolder(
      holder.state.reconfigure({ plugins: [] })
    );
    const host = new ProseMirrorAnnotationHost(bare);

    let caught: unknown;
    try {
      host.createAnnotation({ start: 0, end: 1 }, { kind: "hide" });
    } catch (error) {
      caught = error;
    }
    expect(isTidyError(caught, "LAYER_NOT_INSTALLED")).toBe(true);
  });

  it("should reject spans outside the document", () => {
    const host = new ProseMirrorAnnotationHost(new StateHolder(createTidyEditorState("text")));
    expect(() => host.createAnnotation({ start: 2, end: 9 }, { kind: "hide" })).toThrow(
      "Span [2, 9) outside document of size 4"
    );
  });

  it("should reject unknown and already removed handles", () => {
    const host = new ProseMirrorAnnotationHost(new StateHolder(createTidyEditorState("text")));
    const handle = host.createAnnotation({ start: 0, end: 2 }, { kind: "glyph", text: "♯" });

    host.removeAnnotation(handle);

    expect(host.size).toBe(0);
    expect(() => host.removeAnnotation(handle)).toThrow("No annotation tidy-1");
  });

  it("should keep annotation transactions out of history", () => {
    const holder = new StateHolder(createTidyEditorState("text"));
    const dispatch = vi.spyOn(holder, "dispatch");
    const host = new ProseMirrorAnnotationHost(holder);

    host.createAnnotation({ start: 0, end: 2 }, { kind: "hide" });

    const [tr] = dispatch.mock.calls[0];
    expect(tr.getMeta("addToHistory")).toBe(false);
    expect(tr.docChanged).toBe(false);
  });
});
