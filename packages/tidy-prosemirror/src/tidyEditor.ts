import {
  parseDocument,
  type TidyConfig,
  type TidyLogger,
  TidyMode,
  TidySession,
} from "@tidyfold/core";
import { EditorState, type Plugin } from "prosemirror-state";

import { type TransactionTarget, ProseMirrorAnnotationHost } from "./prosemirrorHost";
import { createTextDocument, documentText, tidySchema } from "./schema";
import { createTidyLayerPlugin, isTidyLayerStale, type TidyLayerOptions } from "./tidyLayer";

export type ProseMirrorTidyOptions = {
  config?: TidyConfig;
  logger?: TidyLogger;
  documentId?: string;
};

/** Editor state over `text` with the tidy layer installed ahead of `plugins` */
export function createTidyEditorState(
  text: string,
  options: TidyLayerOptions & { plugins?: Plugin[] } = {}
): EditorState {
  const { plugins = [], ...layerOptions } = options;
  return EditorState.create({
    schema: tidySchema,
    doc: createTextDocument(text),
    plugins: [createTidyLayerPlugin(layerOptions), ...plugins],
  });
}

/**
 * Tidy mode bound to an editor: reads the text of the current document and
 * draws into the tidy layer of the target's state. A save after edits rebuilds
 * the annotations, since the registry keeps spans from creation time.
 */
export function createProseMirrorTidyMode(
  target: TransactionTarget,
  options: ProseMirrorTidyOptions = {}
): TidyMode {
  const session = new TidySession({
    host: new ProseMirrorAnnotationHost(target),
    config: options.config,
    logger: options.logger,
    documentId: options.documentId,
  });
  return new TidyMode({
    session,
    source: { getText: () => documentText(target.state.doc) },
    parse: parseDocument,
    needsRefresh: () => isTidyLayerStale(target.state),
  });
}
