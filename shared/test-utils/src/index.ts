/**
 * @slidesmith/test-utils
 *
 * Shared test utilities: loggers, fixtures and in-process stand-ins for
 * the image generator, processor and network.
 *
 * Mock factories return properly typed objects, with any `as unknown as`
 * cast centralized inside the factory function.
 */

// Logger utilities
export { createSilentLogger, createMockLogger } from "./mock-logger";

// Schema fixtures
export {
  createPresentationDocument,
  createSlide,
  createIcon,
  omitPath,
  setPath,
} from "./fixtures";
export type { PresentationFixtureOptions } from "./fixtures";

// Image pipeline fakes
export { FakeImageGenerator, FakeImageProcessor } from "./fake-image-generator";
export type { FakeImageGeneratorOptions } from "./fake-image-generator";
export { TINY_PNG, createPng, readImageSize } from "./images";

// Network
export { mockFetch } from "./mock-fetch";
export type { FetchHandler } from "./mock-fetch";

// Filesystem
export { createTempDir, removeTempDir } from "./temp-dir";
