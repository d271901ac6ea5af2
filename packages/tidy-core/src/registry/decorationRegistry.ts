import type { DecorationKind, DecorationRecord, Span } from "../types";

/**
 * Insertion-ordered record of every annotation a session has created.
 *
 * The registry is the sole owner of the handles it holds: records leave it
 * only through `drainAll`, and whoever drains is responsible for releasing
 * each handle once.
 */
export class DecorationRegistry {
  private entries: DecorationRecord[] = [];

  get size(): number {
    return this.entries.length;
  }

  /**
   * True when a stored visual record starts where `span` starts and ends at or
   * after `span.end`. A candidate that shrank relative to a stored record still
   * counts as present.
   */
  exists(span: Span): boolean {
    return this.entries.some(
      (record) =>
        record.kind === "visual" && record.span.start === span.start && span.end <= record.span.end
    );
  }

  /** Appends without checking for duplicates; call `exists` first. */
  add(record: DecorationRecord): void {
    this.entries.push(record);
  }

  drainAll(): DecorationRecord[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  records(): readonly DecorationRecord[] {
    return [...this.entries];
  }

  count(kind: DecorationKind): number {
    return this.entries.filter((record) => record.kind === kind).length;
  }
}
