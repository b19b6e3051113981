import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_LLM_TIMEOUT_MS, LlmConfig } from '../config/configuration';
import { ChatCompletionsSummarizer } from './chat-completions.summarizer';
import { OllamaSummarizer } from './ollama.summarizer';
import { SUMMARIZER, Summarizer } from './summarizer.interface';

export function createSummarizer(config: LlmConfig): Summarizer {
  return config.provider === 'openai' ? new ChatCompletionsSummarizer(config) : new OllamaSummarizer(config);
}

@Module({
  providers: [
    {
      provide: SUMMARIZER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Summarizer => {
        const config = configService.get<LlmConfig>('llm', {
          provider: 'ollama',
          baseUrl: 'http://localhost:11434',
          model: 'codellama',
          timeoutMs: DEFAULT_LLM_TIMEOUT_MS,
        });
        const summarizer = createSummarizer(config);
        new Logger('LlmModule').log(`Using ${config.provider} model ${config.model} at ${config.baseUrl}`);
        return summarizer;
      },
    },
  ],
  exports: [SUMMARIZER],
})
export class LlmModule {}
