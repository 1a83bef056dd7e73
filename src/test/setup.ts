/**
 * Test setup file
 * Sets up environment variables for tests
 */

// Set test environment variables before importing any modules
process.env.NODE_ENV = 'test';
process.env.SHARED_DB_ADMIN_PASSWORD = 'test-secret';
process.env.LOG_LEVEL = 'error'; // Minimize logging during tests
