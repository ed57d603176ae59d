// tests/setupTests.ts
//
// Global test setup. The precision setting is process-wide, so every test
// starts from the default regardless of what the previous one changed.

import { afterEach } from 'vitest';

import { resetPrecision } from '../src/core/precision';

afterEach(() => {
  resetPrecision();
});
