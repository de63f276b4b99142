import { vi } from "vitest";
import { Logger, LogLevel } from "@slidesmith/utils";

/**
 * Create a silent logger for tests
 * This is a real logger with LogLevel.NONE - no output
 */
export function createSilentLogger(context?: string): Logger {
  return Logger.createFresh({
    level: LogLevel.NONE,
    ...(context ? { context } : {}),
  });
}

/**
 * Create a mock Logger for testing with spyable methods
 *
 * The cast is centralized here so test files don't need `as unknown as` casts.
 *
 * @example
 * ```typescript
 * const mockLogger = createMockLogger();
 * const versions = new FileSystemVersionManager({ logger: mockLogger });
 * await versions.updateCurrentPointer(projectDir, 2);
 *
 * expect(mockLogger.debug).toHaveBeenCalled();
 * ```
 */
export function createMockLogger(): Logger {
  const mockLogger = {
    silly: vi.fn(),
    verbose: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => mockLogger),
  };

  return mockLogger as unknown as Logger;
}
