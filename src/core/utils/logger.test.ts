import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('pino', () => ({
  default: vi.fn(() => ({ level: 'info' })),
}));

describe('Logger Module', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    vi.clearAllMocks();
    vi.resetModules();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  async function pinoOptions(): Promise<unknown> {
    await import('./logger.js');
    const pino = (await import('pino')).default;
    return vi.mocked(pino).mock.calls[0]?.[0];
  }

  it('should use LOG_LEVEL when set', async () => {
    process.env.LOG_LEVEL = 'warn';
    process.env.NODE_ENV = 'test';

    expect(await pinoOptions()).toEqual({ level: 'warn', transport: undefined });
  });

  it('should fall back to debug when DEBUG is set', async () => {
    delete process.env.LOG_LEVEL;
    process.env.DEBUG = '1';
    process.env.NODE_ENV = 'production';

    expect(await pinoOptions()).toEqual({ level: 'debug', transport: undefined });
  });

  it('should pretty-print to stderr in development', async () => {
    delete process.env.LOG_LEVEL;
    delete process.env.DEBUG;
    process.env.NODE_ENV = 'development';

    expect(await pinoOptions()).toEqual({
      level: 'info',
      transport: {
        target: 'pino-pretty',
        options: expect.objectContaining({ colorize: true, destination: 2 }),
      },
    });
  });
});
