import { evaluateReadiness } from '../../routes';

jest.mock('../../config/logger.config', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('evaluateReadiness', () => {
  it('is ready when there is nothing to check', async () => {
    expect(await evaluateReadiness([])).toEqual({ ready: true, checks: {} });
  });

  it('reports each check by name', async () => {
    const report = await evaluateReadiness([
      { name: 'database', check: async () => true },
      { name: 'redis', check: async () => false },
    ]);

    expect(report).toEqual({ ready: false, checks: { database: 'ok', redis: 'error' } });
  });

  it('counts a check that throws as failed', async () => {
    const report = await evaluateReadiness([
      {
        name: 'redis',
        check: async () => {
          throw new Error('ECONNREFUSED');
        },
      },
    ]);

    expect(report).toEqual({ ready: false, checks: { redis: 'error' } });
  });
});
