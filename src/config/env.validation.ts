import { plainToInstance, Type } from 'class-transformer';
import { IsIn, IsInt, IsNumberString, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';
import { MAX_TIMER_DELAY_MS } from './configuration';

export class EnvironmentVariables {
  @IsOptional()
  @IsNumberString({ no_symbols: true })
  PORT?: string;

  // Timer delays outside 1..2^31-1 ms fire immediately in Node
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_TIMER_DELAY_MS)
  ANALYZER_COMMAND_TIMEOUT_MS?: number;

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  ANALYZER_SAMPLE_MAX_CHARS?: string;

  @IsOptional()
  @IsIn(['true', 'false'])
  ANALYZER_TEST_SCAN_RESPECTS_IGNORE_LIST?: string;

  @IsOptional()
  @IsString()
  ANALYZER_WORKSPACE_ROOT?: string;

  @IsOptional()
  @IsIn(['contributor-guide', 'overview'])
  ANALYZER_PROMPT_TEMPLATE?: string;

  @IsOptional()
  @IsIn(['ollama', 'openai'])
  LLM_PROVIDER?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  LLM_BASE_URL?: string;

  @IsOptional()
  @IsString()
  LLM_MODEL?: string;

  @IsOptional()
  @IsString()
  LLM_API_KEY?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_TIMER_DELAY_MS)
  LLM_TIMEOUT_MS?: number;
}

/**
 * Rejects malformed analyzer settings at startup. Unknown variables are left
 * alone since the whole process environment is passed in.
 */
export function validate(config: Record<string, unknown>): Record<string, unknown> {
  const env = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(env, { skipMissingProperties: true });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return config;
}
