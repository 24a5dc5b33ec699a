// =====================================================
// Global Test Setup
// =====================================================
// Runs before every test file. Tests never reach a real
// database or network; the helpers provide in-process
// stand-ins.

process.env.NODE_ENV = 'test';

// Suppress verbose logs during tests (unless DEBUG is set)
if (!process.env.DEBUG) {
  process.env.LOG_LEVEL = 'error';
}
