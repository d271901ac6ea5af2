import type {
  DocumentTree,
  DrawerNode,
  HeadingNode,
  NodeOfType,
  NodeProperty,
  OutlineNode,
  OutlineNodeType,
  PropertyDrawerNode,
} from "./types";

type SourceLine = {
  text: string;
  start: number;
  /** Offset of the line terminator, or end of text */
  end: number;
  /** Offset of the following line */
  next: number;
};

/** Where the previous significant line leaves us */
type LineContext = "start" | "after-heading" | "after-planning" | "body";

const HEADING_PATTERN = /^(\*+)[ \t]+(.*)$/;
const PLANNING_PATTERN = /^[ \t]*(SCHEDULED|DEADLINE|CLOSED):/;
const DRAWER_OPEN_PATTERN = /^[ \t]*:([\w-]+):[ \t]*$/;
const DRAWER_END_PATTERN = /^[ \t]*:END:[ \t]*$/i;
const PROPERTY_PATTERN = /^[ \t]*:([^\s:]+):(?:[ \t]+(.*?))?[ \t]*$/;

export function splitSourceLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;
  while (start <= text.length) {
    const newline = text.indexOf("\n", start);
    const end = newline === -1 ? text.length : newline;
    const next = newline === -1 ? text.length : newline + 1;
    lines.push({ text: text.slice(start, end).replace(/\r$/, ""), start, end, next });
    if (newline === -1) {
      break;
    }
    start = next;
  }
  return lines;
}

function findDrawerEnd(lines: SourceLine[], openIndex: number): number | null {
  for (let i = openIndex + 1; i < lines.length; i++) {
    const text = lines[i].text;
    if (DRAWER_END_PATTERN.test(text)) {
      return i;
    }
    // Drawers never span a heading
    if (HEADING_PATTERN.test(text)) {
      return null;
    }
  }
  return null;
}

function collectProperties(lines: SourceLine[], from: number, to: number): NodeProperty[] {
  const properties: NodeProperty[] = [];
  for (let i = from; i < to; i++) {
    const line = lines[i];
    const match = PROPERTY_PATTERN.exec(line.text);
    if (!match) {
      continue;
    }
    properties.push({
      key: match[1],
      value: match[2] ?? "",
      span: { start: line.start, end: line.end },
    });
  }
  return properties;
}

/**
 * Parse outline text into a tree of headings and drawers.
 *
 * A property drawer is recognised on the first line of the text or right
 * after a heading (a planning line may sit in between); any other
 * `:NAME:` ... `:END:` block is a plain drawer. Drawer spans run from the
 * start of the opening line to just past the terminator of the `:END:` line.
 */
export function parseDocument(text: string): DocumentTree {
  const tree: DocumentTree = { type: "document", span: { start: 0, end: text.length }, children: [] };
  const lines = splitSourceLines(text);
  const openHeadings: HeadingNode[] = [];
  let context: LineContext = "start";

  const closeHeadings = (minLevel: number, end: number) => {
    while (openHeadings.length > 0) {
      const top = openHeadings[openHeadings.length - 1];
      if (top.level < minLevel) {
        break;
      }
      top.span.end = end;
      openHeadings.pop();
    }
  };

  const append = (node: OutlineNode) => {
    const parent = openHeadings[openHeadings.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      tree.children.push(node);
    }
  };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];

    const heading = HEADING_PATTERN.exec(line.text);
    if (heading) {
      const level = heading[1].length;
      closeHeadings(level, line.start);
      const node: HeadingNode = {
        type: "heading",
        level,
        title: heading[2].trim(),
        span: { start: line.start, end: text.length },
        children: [],
      };
      append(node);
      openHeadings.push(node);
      context = "after-heading";
      i++;
      continue;
    }

    if (context === "after-heading" && PLANNING_PATTERN.test(line.text)) {
      context = "after-planning";
      i++;
      continue;
    }

    const open = DRAWER_OPEN_PATTERN.exec(line.text);
    const endIndex = open && open[1].toUpperCase() !== "END" ? findDrawerEnd(lines, i) : null;
    if (open && endIndex !== null) {
      const span = { start: line.start, end: lines[endIndex].next };
      const name = open[1];
      const attachable = context !== "body";
      if (name.toUpperCase() === "PROPERTIES" && attachable) {
        const drawer: PropertyDrawerNode = {
          type: "property-drawer",
          span,
          properties: collectProperties(lines, i + 1, endIndex),
        };
        append(drawer);
      } else {
        const drawer: DrawerNode = { type: "drawer", name, span };
        append(drawer);
      }
      context = "body";
      i = endIndex + 1;
      continue;
    }

    context = "body";
    i++;
  }

  closeHeadings(0, text.length);
  return tree;
}

function* walk(nodes: OutlineNode[]): Generator<OutlineNode> {
  for (const node of nodes) {
    yield node;
    if (node.type === "heading") {
      yield* walk(node.children);
    }
  }
}

/** Every node of the tree, depth first, in document order. */
export function walkNodes(tree: DocumentTree): Generator<OutlineNode> {
  return walk(tree.children);
}

function isNodeOfType<T extends OutlineNodeType>(node: OutlineNode, type: T): node is NodeOfType<T> {
  return node.type === type;
}

/** Every node of `type`, depth first, in document order. */
export function* mapNodes<T extends OutlineNodeType>(
  tree: DocumentTree,
  type: T
): Generator<NodeOfType<T>> {
  for (const node of walkNodes(tree)) {
    if (isNodeOfType(node, type)) {
      yield node;
    }
  }
}
