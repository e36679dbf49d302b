// Global test setup for Jest

// Extend Jest timeout for property-based tests
jest.setTimeout(30000);

beforeAll(() => {
    // Set up test environment variables
    process.env.LLM_API_KEY = 'test-secret';
    process.env.BOT_TOKEN = '123456789:test-token';
    process.env.NODE_ENV = 'test';
});

// Mock console methods in tests to reduce noise
global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
};
