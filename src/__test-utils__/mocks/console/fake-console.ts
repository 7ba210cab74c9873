/**
 * Console stand-in whose methods are spies, for injecting into `main`.
 */

import type { Mock } from 'vitest';
import { vi } from 'vitest';

export function fakeConsole(): Readonly<{ log: Mock; error: Mock; warn: Mock; info: Mock }> {
  return { log: vi.fn(), error: vi.fn(), warn: vi.fn(), info: vi.fn() };
}
