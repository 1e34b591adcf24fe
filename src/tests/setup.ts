import { afterAll, beforeAll } from 'vitest';

beforeAll(() => {
  process.env.NODE_ENV = 'test';
  process.env.LOG_LEVEL = 'error'; // Reduce noise during tests

  // Settings from the developer's shell must not leak into tests
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('DOCS_')) delete process.env[key];
  }
});

afterAll(async () => {
  // Imported here so the setup file does not load modules before a test's vi.mock applies
  const { removeCorpora } = await import('./corpus.js');
  await removeCorpora();
});
