/**
 * Shared Vitest setup.
 *
 * Logging goes to stderr through console.error/console.warn; silence it for
 * every suite and restore the default logger configuration afterwards so a
 * test that turns on verbose mode cannot leak into the next one.
 */

import { vi, beforeEach, afterEach } from 'vitest';
import { resetLoggerConfig } from './src/telemetry/logger.js';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  resetLoggerConfig();
});
