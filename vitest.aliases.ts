/**
 * Vitest alias configuration for workspace packages.
 *
 * Points workspace imports at their TypeScript sources so tests run without a
 * build.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  {
    find: "@blkverify/harness",
    replacement: path.resolve(__dirname, "packages/verify-harness/src/index.ts"),
  },
];
