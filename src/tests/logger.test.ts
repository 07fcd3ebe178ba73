import { createLogger } from '../utils/logger';

describe('logger', () => {
  const previousLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (previousLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previousLevel;
    }
  });

  it('should not take its level from the environment', async () => {
    process.env.LOG_LEVEL = 'debug';

    await jest.isolateModulesAsync(async () => {
      const { logger } = await import('../utils/logger');
      expect(logger.level).toBe('info');
    });
  });

  it('should build loggers at an explicit level', () => {
    expect(createLogger('debug').level).toBe('debug');
    expect(createLogger().level).toBe('info');
  });
});
