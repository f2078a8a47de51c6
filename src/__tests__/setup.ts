// Jest sets NODE_ENV=test, which keeps the winston logger silent.

afterEach(() => {
  jest.clearAllMocks();
});
