import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { LlmConfig } from '../config/configuration';
import { describeHttpError } from './http-error';
import { Summarizer, SummarizerError } from './summarizer.interface';

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
}

/** Any OpenAI-compatible `/chat/completions` endpoint (OpenAI, Groq, vLLM, ...). */
export class ChatCompletionsSummarizer implements Summarizer {
  private readonly logger = new Logger(ChatCompletionsSummarizer.name);
  private readonly http: AxiosInstance;
  readonly model: string;

  constructor(config: LlmConfig) {
    if (!config.apiKey) {
      throw new SummarizerError('LLM_API_KEY must be set when LLM_PROVIDER is "openai"');
    }
    this.model = config.model;
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async summarize(prompt: string): Promise<string> {
    this.logger.log(`Sending ${prompt.length} chars to chat model ${this.model}`);
    try {
      const { data } = await this.http.post<ChatCompletionResponse>('/chat/completions', {
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.3,
        stream: false,
      });
      const content = data.choices?.[0]?.message?.content;
      if (typeof content !== 'string' || content === '') {
        throw new SummarizerError('No response content from chat completions API');
      }
      return content;
    } catch (error) {
      if (error instanceof SummarizerError) {
        throw error;
      }
      throw new SummarizerError(`Chat completions request failed: ${describeHttpError(error)}`);
    }
  }
}
