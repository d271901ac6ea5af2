import { TidyError } from "../errors";
import type { DecorationRegistry } from "../registry/decorationRegistry";
import type { AnnotationHost, DecorationRecord } from "../types";

export type RestoreReport = {
  removed: number;
};

type RemovalFailure = {
  record: DecorationRecord;
  error: unknown;
};

/**
 * Drain the registry and release every annotation it held.
 *
 * Removal continues past a failing record so nothing else leaks; the failures
 * are reported together once the registry is empty.
 */
export function untidy(context: { registry: DecorationRegistry; host: AnnotationHost }): RestoreReport {
  const failures: RemovalFailure[] = [];
  let removed = 0;

  for (const record of context.registry.drainAll()) {
    try {
      context.host.removeAnnotation(record.handle);
      removed++;
    } catch (error) {
      failures.push({ record, error });
    }
  }

  if (failures.length > 0) {
    throw new TidyError(
      "ANNOTATION_REMOVE_FAILED",
      `Failed to remove ${failures.length} of ${removed + failures.length} annotations`,
      {
        cause: failures[0].error,
        context: {
          removed,
          failed: failures.map(({ record }) => ({ kind: record.kind, handleId: record.handle.id })),
        },
      }
    );
  }

  return { removed };
}
