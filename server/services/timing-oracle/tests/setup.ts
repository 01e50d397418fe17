/**
 * Vitest Setup File
 *
 * Restores spies and stubbed globals between tests
 */

import { afterEach, vi } from "vitest";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

process.env.NODE_ENV = "test";
