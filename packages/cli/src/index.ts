#!/usr/bin/env tsx
import { Command } from "commander";
import { runCommand } from "./commands/run";
import { writeStderr } from "./utils/terminal";

const program = new Command();

program
  .name("blkverify")
  .description("Data-integrity verification harness for block I/O workloads")
  .version("0.1.0");

program.addCommand(runCommand(), { isDefault: true });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  writeStderr(message);
  process.exit(1);
});
