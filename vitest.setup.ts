process.env.NODE_ENV = 'test';
// Read by the logger singleton when a test file first imports it
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
