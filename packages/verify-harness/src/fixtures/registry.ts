import path from "node:path";
import type { ChecksumAlgorithm, WriteDirection } from "../cases/types";
import { MissingFixtureError } from "../errors";

export type FixtureRecord = {
  testId: number;
  directory: string;
  direction: WriteDirection;
  checksum: ChecksumAlgorithm;
};

/**
 * Fixtures produced so far in this run, keyed by test id and directory.
 */
export class FixtureRegistry {
  private readonly records = new Map<number, Map<string, FixtureRecord>>();

  record(fixture: FixtureRecord): void {
    let byDirectory = this.records.get(fixture.testId);
    if (!byDirectory) {
      byDirectory = new Map();
      this.records.set(fixture.testId, byDirectory);
    }
    byDirectory.set(path.resolve(fixture.directory), { ...fixture });
  }

  find(testId: number, directory: string): FixtureRecord | undefined {
    return this.records.get(testId)?.get(path.resolve(directory));
  }

  /**
   * @throws MissingFixtureError when no completed case produced the directory
   */
  require(testId: number, directory: string): FixtureRecord {
    const fixture = this.find(testId, directory);
    if (!fixture) {
      throw new MissingFixtureError(testId, directory);
    }
    return fixture;
  }

  get size(): number {
    let count = 0;
    for (const byDirectory of this.records.values()) {
      count += byDirectory.size;
    }
    return count;
  }
}
