/**
 * Vitest alias configuration for workspace packages.
 *
 * Each package resolves to its TypeScript entry so tests never need a build.
 */

import { fileURLToPath } from "node:url";

export type AliasEntry = { find: string; replacement: string };

const resolveEntry = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export const aliases: AliasEntry[] = [
  {
    find: "@tidyfold/core",
    replacement: resolveEntry("./packages/tidy-core/src/index.ts"),
  },
  {
    find: "@tidyfold/prosemirror",
    replacement: resolveEntry("./packages/tidy-prosemirror/src/index.ts"),
  },
];
