/**
 * Root test setup file
 *
 * Runs before every test file. Silences the winston logger and console so
 * test output stays readable; tests that assert on logging spy on `logger`.
 */

import { vi } from 'vitest';

process.env.NODE_ENV = 'test';

vi.mock('@cae/utils', async () => {
  const actual = await vi.importActual<typeof import('@cae/utils')>('@cae/utils');
  const silent = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
  const child = () => ({ ...silent, child });
  return {
    ...actual,
    logger: { ...silent, child },
    createLogger: () => ({ ...silent, child }),
  };
});

global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
