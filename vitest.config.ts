/**
 * @file vitest.config.ts
 * @description Vitest configuration for the Blob Volley core tests.
 *
 * `environment: 'node'`: the core is pure simulation; nothing here needs a
 * DOM, canvas or audio stub.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig(
{
  test:
  {
    environment: 'node',
    include:     ['tests/**/*.test.ts'],
  },
});
