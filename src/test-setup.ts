/**
 * Test setup file - runs before all tests
 * Sets up environment variables needed for testing
 */

// Placeholder signing key for config tests
process.env.JWT_SECRET = 'test-secret';

// Use in-memory databases
process.env.DB_PATH = ':memory:';

// Keep test output quiet
process.env.LOG_LEVEL = 'silent';

// Set NODE_ENV to test
process.env.NODE_ENV = 'test';
