import * as os from 'os';

export const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;
export const DEFAULT_SAMPLE_MAX_CHARS = 15_000;
export const DEFAULT_LLM_TIMEOUT_MS = 180_000;
/** Node clamps larger setTimeout delays to 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type LlmProvider = 'ollama' | 'openai';

export interface AnalyzerConfig {
  commandTimeoutMs: number;
  sampleMaxChars: number;
  testScanRespectsIgnoreList: boolean;
  workspaceRoot: string;
  promptTemplate: string;
}

export interface LlmConfig {
  provider: LlmProvider;
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  analyzer: AnalyzerConfig;
  llm: LlmConfig;
}

const toInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default (): AppConfig => ({
  port: toInt(process.env.PORT, 3000),
  analyzer: {
    commandTimeoutMs: toInt(process.env.ANALYZER_COMMAND_TIMEOUT_MS, DEFAULT_COMMAND_TIMEOUT_MS),
    sampleMaxChars: toInt(process.env.ANALYZER_SAMPLE_MAX_CHARS, DEFAULT_SAMPLE_MAX_CHARS),
    testScanRespectsIgnoreList: process.env.ANALYZER_TEST_SCAN_RESPECTS_IGNORE_LIST === 'true',
    workspaceRoot: process.env.ANALYZER_WORKSPACE_ROOT || os.tmpdir(),
    promptTemplate: process.env.ANALYZER_PROMPT_TEMPLATE || 'contributor-guide',
  },
  llm: {
    provider: process.env.LLM_PROVIDER === 'openai' ? 'openai' : 'ollama',
    baseUrl: process.env.LLM_BASE_URL || 'http://localhost:11434',
    model: process.env.LLM_MODEL || 'codellama',
    apiKey: process.env.LLM_API_KEY,
    timeoutMs: toInt(process.env.LLM_TIMEOUT_MS, DEFAULT_LLM_TIMEOUT_MS),
  },
});
