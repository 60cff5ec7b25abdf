import { vi } from 'vitest';

vi.mock('@rp/logger', () => {
  const noop = () => undefined;
  const logger = {
    info: vi.fn(noop),
    warn: vi.fn(noop),
    error: vi.fn(noop),
    debug: vi.fn(noop),
    trace: vi.fn(noop),
    fatal: vi.fn(noop),
    flush: vi.fn(),
    child: vi.fn((): unknown => logger),
  };

  return {
    makeLogger: vi.fn(() => logger),
    getLogFilePath: vi.fn(() => null),
    closeLogger: vi.fn(),
  };
});
