import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { LlmConfig } from '../config/configuration';
import { describeHttpError } from './http-error';
import { Summarizer, SummarizerError } from './summarizer.interface';

interface OllamaGenerateResponse {
  response?: unknown;
}

/** Talks to a local Ollama server through `/api/generate`. */
export class OllamaSummarizer implements Summarizer {
  private readonly logger = new Logger(OllamaSummarizer.name);
  private readonly http: AxiosInstance;
  readonly model: string;

  constructor(config: LlmConfig) {
    this.model = config.model;
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async summarize(prompt: string): Promise<string> {
    this.logger.log(`Sending ${prompt.length} chars to Ollama model ${this.model}`);
    try {
      const { data } = await this.http.post<OllamaGenerateResponse>('/api/generate', {
        model: this.model,
        prompt,
        stream: false,
      });
      if (typeof data.response !== 'string') {
        throw new SummarizerError('No response content from Ollama');
      }
      return data.response;
    } catch (error) {
      if (error instanceof SummarizerError) {
        throw error;
      }
      throw new SummarizerError(`Ollama request failed: ${describeHttpError(error)}`);
    }
  }
}
