// tests/setupTests.ts
//
// Runs before every test file. Components log through pino; keep the
// output out of test runs unless a test opts in with its own logger.

process.env.LOG_LEVEL = 'silent';
