/**
 * Vitest Setup File
 * Global test configuration
 */

// Components fall back to their own named loggers; keep them quiet unless a test injects one
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
