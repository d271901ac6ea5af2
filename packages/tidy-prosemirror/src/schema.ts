import { type Node as PMNode, Schema } from "prosemirror-model";

/**
 * Plain-text outline schema: the document node holds text directly, so a
 * ProseMirror position is the same number as a character offset.
 */
export const tidySchema = new Schema({
  nodes: {
    doc: {
      content: "text*",
      code: true,
      marks: "",
    },
    text: {},
  },
});

export function createTextDocument(text: string): PMNode {
  return tidySchema.node("doc", null, text.length > 0 ? [tidySchema.text(text)] : []);
}

export function documentText(doc: PMNode): string {
  return doc.textBetween(0, doc.content.size);
}
