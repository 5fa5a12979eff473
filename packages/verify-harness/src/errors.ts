/**
 * Harness Error Types
 */

export class HarnessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HarnessError";
  }
}

export class UnsupportedPlatformError extends HarnessError {
  readonly platform: string;
  constructor(platform: string) {
    super(`Unsupported host platform: ${platform}`);
    this.name = "UnsupportedPlatformError";
    this.platform = platform;
  }
}

export class MissingFixtureError extends HarnessError {
  readonly testId: number;
  readonly directory: string;
  constructor(testId: number, directory: string) {
    super(`No fixture recorded for test ${testId} at ${directory}`);
    this.name = "MissingFixtureError";
    this.testId = testId;
    this.directory = directory;
  }
}

export class ReportParseError extends HarnessError {
  readonly path: string;
  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`${path}: ${message}`, options);
    this.name = "ReportParseError";
    this.path = path;
  }
}

export class InvalidManglePlanError extends HarnessError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidManglePlanError";
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}
