/**
 * Test setup file for Vitest
 */
import { vi, afterEach } from 'vitest';

afterEach(() => {
  vi.restoreAllMocks();
});
