// Console filtering: keep test output quiet unless JEST_ALLOW_ALL_LOGS=1.
const originalLog = console.log;
const originalWarn = console.warn;
const originalError = console.error;

const ALLOW_ALL = process.env.JEST_ALLOW_ALL_LOGS === '1';

if (!ALLOW_ALL) {
  console.log = () => {};
  console.warn = () => {};
  console.error = () => {};
}

// Restore original console methods after tests
afterAll(() => {
  console.log = originalLog;
  console.warn = originalWarn;
  console.error = originalError;
});
