import type { Span } from "../types";

export type NodeProperty = {
  key: string;
  value: string;
  span: Span;
};

export type PropertyDrawerNode = {
  type: "property-drawer";
  span: Span;
  properties: NodeProperty[];
};

export type DrawerNode = {
  type: "drawer";
  name: string;
  span: Span;
};

export type HeadingNode = {
  type: "heading";
  level: number;
  title: string;
  /** Whole section: heading line through the last line before the next heading of equal or lower level */
  span: Span;
  children: OutlineNode[];
};

export type OutlineNode = HeadingNode | PropertyDrawerNode | DrawerNode;

export type OutlineNodeType = OutlineNode["type"];

export type NodeOfType<T extends OutlineNodeType> = Extract<OutlineNode, { type: T }>;

export type DocumentTree = {
  type: "document";
  span: Span;
  children: OutlineNode[];
};
