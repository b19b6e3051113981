import configuration, { DEFAULT_COMMAND_TIMEOUT_MS, DEFAULT_SAMPLE_MAX_CHARS } from './configuration';
import { validate } from './env.validation';

describe('validate', () => {
  it('accepts an empty environment', () => {
    expect(validate({})).toEqual({});
  });

  it('accepts well-formed analyzer settings and ignores unrelated variables', () => {
    const env = {
      PATH: '/usr/bin',
      ANALYZER_COMMAND_TIMEOUT_MS: '60000',
      ANALYZER_TEST_SCAN_RESPECTS_IGNORE_LIST: 'true',
      LLM_PROVIDER: 'openai',
      LLM_BASE_URL: 'http://localhost:8000/v1',
    };

    expect(validate(env)).toBe(env);
  });

  it('rejects malformed values', () => {
    expect(() => validate({ ANALYZER_COMMAND_TIMEOUT_MS: 'soon', LLM_PROVIDER: 'carrier-pigeon' })).toThrow(
      /^Invalid environment configuration: /,
    );
  });

  it.each(['0', '3000000000', '1.5', '-5'])('rejects a command timeout of %s', (value) => {
    expect(() => validate({ ANALYZER_COMMAND_TIMEOUT_MS: value })).toThrow(
      'Invalid environment configuration: ANALYZER_COMMAND_TIMEOUT_MS',
    );
  });

  it('accepts the largest timer delay', () => {
    const env = { ANALYZER_COMMAND_TIMEOUT_MS: '2147483647', LLM_TIMEOUT_MS: '1' };

    expect(validate(env)).toBe(env);
  });
});

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('falls back to defaults', () => {
    delete process.env.ANALYZER_COMMAND_TIMEOUT_MS;
    delete process.env.ANALYZER_SAMPLE_MAX_CHARS;
    delete process.env.ANALYZER_TEST_SCAN_RESPECTS_IGNORE_LIST;
    delete process.env.LLM_PROVIDER;

    const config = configuration();

    expect(config.analyzer.commandTimeoutMs).toBe(DEFAULT_COMMAND_TIMEOUT_MS);
    expect(config.analyzer.sampleMaxChars).toBe(DEFAULT_SAMPLE_MAX_CHARS);
    expect(config.analyzer.testScanRespectsIgnoreList).toBe(false);
    expect(config.llm.provider).toBe('ollama');
  });

  it('reads overrides from the environment', () => {
    process.env.ANALYZER_COMMAND_TIMEOUT_MS = '1000';
    process.env.ANALYZER_TEST_SCAN_RESPECTS_IGNORE_LIST = 'true';
    process.env.LLM_PROVIDER = 'openai';
    process.env.LLM_MODEL = 'small-model';

    const config = configuration();

    expect(config.analyzer.commandTimeoutMs).toBe(1000);
    expect(config.analyzer.testScanRespectsIgnoreList).toBe(true);
    expect(config.llm).toMatchObject({ provider: 'openai', model: 'small-model' });
  });
});
