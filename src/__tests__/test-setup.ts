/**
 * Jest Test Setup
 *
 * Runs after the test framework is installed in every test file.
 */

import "reflect-metadata";
import { Logger } from "@nestjs/common";

process.env.NODE_ENV = "test";

// Set TEST_LOGGING=true to see service logs while debugging a spec
const testLoggingEnabled = process.env.TEST_LOGGING === "true";

const originalConsole: Pick<Console, "error" | "warn" | "log" | "debug"> = {
  error: console.error,
  warn: console.warn,
  log: console.log,
  debug: console.debug,
};

const createConsoleOverride =
  (originalMethod: typeof console.error) =>
  (...args: unknown[]) => {
    if (testLoggingEnabled) {
      originalMethod(...args);
    }
  };

console.error = createConsoleOverride(originalConsole.error);
console.warn = createConsoleOverride(originalConsole.warn);
console.log = createConsoleOverride(originalConsole.log);
console.debug = createConsoleOverride(originalConsole.debug);

// Nest loggers write to stdout directly, not through console
if (!testLoggingEnabled) {
  Logger.overrideLogger(false);
}

afterAll(() => {
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.log = originalConsole.log;
  console.debug = originalConsole.debug;
});
