import { TidyError } from "../errors";
import type { AnnotationHandle, AnnotationHost, RenderSpec, Span } from "../types";

export type MemoryAnnotation = {
  id: string;
  span: Span;
  spec: RenderSpec;
};

/**
 * Annotation host that keeps annotations in a map. Useful headless, and as
 * the reference for what an editor host has to provide.
 */
export class MemoryAnnotationHost implements AnnotationHost {
  private readonly annotations = new Map<string, MemoryAnnotation>();
  private nextId = 1;

  constructor(private readonly prefix = "mem") {}

  get size(): number {
    return this.annotations.size;
  }

  createAnnotation(span: Span, spec: RenderSpec): AnnotationHandle {
    if (span.start < 0 || span.end < span.start) {
      throw new TidyError("SPAN_OUT_OF_RANGE", `Invalid span [${span.start}, ${span.end})`, {
        context: { span },
      });
    }
    const id = `${this.prefix}-${this.nextId++}`;
    this.annotations.set(id, { id, span: { ...span }, spec });
    return { id };
  }

  removeAnnotation(handle: AnnotationHandle): void {
    if (!this.annotations.delete(handle.id)) {
      throw new TidyError("UNKNOWN_ANNOTATION", `No annotation ${handle.id}`, {
        context: { handleId: handle.id },
      });
    }
  }

  list(): MemoryAnnotation[] {
    return [...this.annotations.values()];
  }

  /** Guards whose span contains `offset` */
  guardsAt(offset: number): MemoryAnnotation[] {
    return this.list().filter(
      (annotation) =>
        annotation.spec.kind === "input-intercept" &&
        annotation.span.start <= offset &&
        offset < annotation.span.end
    );
  }
}
