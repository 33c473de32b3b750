// Test setup file

// Keep parser debug output out of test runs unless asked for
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'error';
process.env.NODE_ENV = 'test';
