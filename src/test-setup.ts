import { afterEach, vi } from 'vitest';

// Mock history, env stubs and fake timers stay inside the test that made them.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  vi.useRealTimers();
});
