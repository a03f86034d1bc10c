import { vi, afterEach } from 'vitest';

// Mock logger to prevent console output during tests
vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    http: vi.fn(),
    debug: vi.fn(),
  },
}));

// Reset mocks between tests
afterEach(() => {
  vi.clearAllMocks();
});
