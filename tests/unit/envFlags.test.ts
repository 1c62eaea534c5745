import { isJestRuntime, isTestEnvironment, readEnv } from '../../src/shared/utils/envFlags';

describe('envFlags helpers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('readEnv reads from process.env when present', () => {
    delete process.env.QUORUM_TEST_FLAG;
    expect(readEnv('QUORUM_TEST_FLAG')).toBeUndefined();

    process.env.QUORUM_TEST_FLAG = 'abc';
    expect(readEnv('QUORUM_TEST_FLAG')).toBe('abc');
  });

  it('isTestEnvironment follows NODE_ENV', () => {
    process.env.NODE_ENV = 'test';
    expect(isTestEnvironment()).toBe(true);

    process.env.NODE_ENV = 'production';
    expect(isTestEnvironment()).toBe(false);
  });

  it('isJestRuntime detects the Jest worker', () => {
    expect(isJestRuntime()).toBe(true);

    delete process.env.JEST_WORKER_ID;
    expect(isJestRuntime()).toBe(false);
  });
});
