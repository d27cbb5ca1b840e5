// ============================================================
// Vision Analyzer - Test Setup
// Global test configuration for Vitest
// ============================================================

import { vi } from 'vitest';

// Keep dispatcher and server logging out of the test output
vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});
