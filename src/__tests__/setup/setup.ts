import { beforeEach, afterEach, jest } from '@jest/globals';

// Global test setup
beforeEach(() => {
  // Reset all mocks
  jest.clearAllMocks();

  // Keep configuration from the developer's shell out of the tests
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('STACHE_')) {
      delete process.env[key];
    }
  }
});

afterEach(() => {
  jest.restoreAllMocks();
});
