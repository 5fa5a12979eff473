/**
 * Block I/O Verification Harness
 *
 * Drives an external workload generator through a matrix of data-integrity
 * cases and classifies every outcome.
 *
 * - Case model, templates and argument builders
 * - Corruption injector and fault-injection phase state machine
 * - Fixture resolution and registry
 * - Platform error taxonomy
 * - Matrix orchestrator and run summary
 */

// Cases
export * from "./cases/args";
export * from "./cases/requirements";
export * from "./cases/templates";
export * from "./cases/types";

// Errors
export * from "./errors";

// Fixtures
export * from "./fixtures/registry";
export * from "./fixtures/resolver";

// Corruption
export * from "./injector/corruption";

// Matrix
export * from "./matrix/orchestrator";
export * from "./matrix/summary";
export * from "./matrix/types";

// Phases
export * from "./phases/stanzas";
export * from "./phases/stateMachine";

// Platform
export * from "./platform/errorTaxonomy";
export * from "./platform/host";

// Report
export * from "./report/parser";
export * from "./report/schema";

// Runner
export * from "./runner/processRunner";
export * from "./runner/types";

// Telemetry
export * from "./telemetry/structuredLogger";
