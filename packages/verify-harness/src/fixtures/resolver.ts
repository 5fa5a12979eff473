/**
 * Fixture Dependency Resolver
 *
 * Artifact directories follow one template:
 *   <root>/ddir_<direction>_csum_<checksum>/<id:04d>
 *   <root>/mangle_<mode>_csum_<checksum>/<id:04d>
 * A read-class case finds its fixture by swapping the direction label for its
 * write-class counterpart. Whether that case actually ran is not checked here.
 */

import path from "node:path";
import {
  type CaseCoordinate,
  FIXTURE_PRODUCERS,
  mangleLabel,
  type ReadDirection,
} from "../cases/types";
import { HarnessError } from "../errors";

export function combinationDirectoryName(coordinate: CaseCoordinate): string {
  if (coordinate.mangle) {
    return `mangle_${mangleLabel(coordinate.mangle)}_csum_${coordinate.checksum}`;
  }
  return `ddir_${coordinate.direction}_csum_${coordinate.checksum}`;
}

export function caseDirectoryName(testId: number): string {
  return String(testId).padStart(4, "0");
}

export function resolveFixtureDirectory(
  combinationDir: string,
  direction: ReadDirection,
  testId: number
): string {
  const base = path.basename(combinationDir);
  const label = `ddir_${direction}_`;
  if (!base.startsWith(label)) {
    throw new HarnessError(`${combinationDir} is not a ${direction} artifact directory`);
  }
  const fixtureBase = `ddir_${FIXTURE_PRODUCERS[direction]}_${base.slice(label.length)}`;
  return path.join(path.dirname(combinationDir), fixtureBase, caseDirectoryName(testId));
}
