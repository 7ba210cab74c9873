/**
 * Test utilities shared by the suites under src/.
 */

export { fakeConsole } from './mocks/console/fake-console.ts';
export { withEnv } from './utils/env.ts';
export { createTempDir, createTempScript } from './utils/temp-utils.ts';
