import axios, { AxiosError, AxiosHeaders, AxiosInstance } from 'axios';
import { LlmConfig } from '../config/configuration';
import { ChatCompletionsSummarizer } from './chat-completions.summarizer';
import { createSummarizer } from './llm.module';
import { OllamaSummarizer } from './ollama.summarizer';
import { SummarizerError } from './summarizer.interface';

const baseConfig: LlmConfig = {
  provider: 'ollama',
  baseUrl: 'http://localhost:11434',
  model: 'codellama',
  timeoutMs: 1000,
};

const httpError = (status: number, statusText: string) =>
  new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, {
    status,
    statusText,
    data: {},
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

describe('summarizers', () => {
  let post: jest.Mock;
  let create: jest.SpyInstance;

  beforeEach(() => {
    post = jest.fn();
    create = jest.spyOn(axios, 'create').mockReturnValue({ post } as unknown as AxiosInstance);
  });

  afterEach(() => {
    create.mockRestore();
  });

  describe('OllamaSummarizer', () => {
    it('configures one client with the base URL and timeout', () => {
      new OllamaSummarizer(baseConfig);

      expect(create).toHaveBeenCalledTimes(1);
      expect(create).toHaveBeenCalledWith({
        baseURL: 'http://localhost:11434',
        timeout: 1000,
        headers: { 'Content-Type': 'application/json' },
      });
    });

    it('posts a non-streaming generate request and returns the text', async () => {
      post.mockResolvedValue({ data: { response: '{"a":1}' } });
      const summarizer = new OllamaSummarizer(baseConfig);

      await expect(summarizer.summarize('hello')).resolves.toBe('{"a":1}');
      expect(post).toHaveBeenCalledWith('/api/generate', { model: 'codellama', prompt: 'hello', stream: false });
    });

    it('rejects a reply without text', async () => {
      post.mockResolvedValue({ data: {} });
      const summarizer = new OllamaSummarizer(baseConfig);

      await expect(summarizer.summarize('hello')).rejects.toThrow('No response content from Ollama');
    });

    it('wraps HTTP failures', async () => {
      post.mockRejectedValue(httpError(503, 'Service Unavailable'));
      const summarizer = new OllamaSummarizer(baseConfig);

      const attempt = summarizer.summarize('hello');
      await expect(attempt).rejects.toBeInstanceOf(SummarizerError);
      await expect(attempt).rejects.toThrow('Ollama request failed: 503 Service Unavailable');
    });
  });

  describe('ChatCompletionsSummarizer', () => {
    const chatConfig: LlmConfig = {
      ...baseConfig,
      provider: 'openai',
      baseUrl: 'https://llm.example.test/v1',
      model: 'small-model',
      apiKey: 'test-secret',
    };

    it('sends the prompt as a single user message with a bearer token', async () => {
      post.mockResolvedValue({ data: { choices: [{ message: { content: 'summary' } }] } });
      const summarizer = new ChatCompletionsSummarizer(chatConfig);

      await expect(summarizer.summarize('hello')).resolves.toBe('summary');
      expect(create).toHaveBeenCalledWith({
        baseURL: 'https://llm.example.test/v1',
        timeout: 1000,
        headers: { Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' },
      });
      expect(post).toHaveBeenCalledWith('/chat/completions', {
        model: 'small-model',
        messages: [{ role: 'user', content: 'hello' }],
        temperature: 0.3,
        stream: false,
      });
    });

    it('rejects an empty choice list', async () => {
      post.mockResolvedValue({ data: { choices: [] } });
      const summarizer = new ChatCompletionsSummarizer(chatConfig);

      await expect(summarizer.summarize('hello')).rejects.toThrow('No response content from chat completions API');
    });

    it('refuses to start without an API key', () => {
      expect(() => new ChatCompletionsSummarizer({ ...chatConfig, apiKey: undefined })).toThrow(SummarizerError);
    });

    it('passes through network errors by message', async () => {
      post.mockRejectedValue(new Error('socket hang up'));
      const summarizer = new ChatCompletionsSummarizer(chatConfig);

      await expect(summarizer.summarize('hello')).rejects.toThrow('Chat completions request failed: socket hang up');
    });
  });

  describe('createSummarizer', () => {
    it('builds the provider named in configuration', () => {
      expect(createSummarizer(baseConfig)).toBeInstanceOf(OllamaSummarizer);
      expect(createSummarizer({ ...baseConfig, provider: 'openai', apiKey: 'test-secret' })).toBeInstanceOf(
        ChatCompletionsSummarizer,
      );
    });
  });
});
