// Increase timeout for all tests
jest.setTimeout(30000);

// Silence progress output during tests
beforeAll(() => {
  const originalConsoleLog = console.log;
  const originalConsoleWarn = console.warn;

  global.console.log = (...args) => {
    if (process.env.DEBUG) {
      originalConsoleLog(...args);
    }
  };

  global.console.warn = (...args) => {
    if (process.env.DEBUG) {
      originalConsoleWarn(...args);
    }
  };
});
