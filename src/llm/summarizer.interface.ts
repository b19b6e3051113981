/** The language model as the analyzer sees it: prompt in, text out. */
export interface Summarizer {
  readonly model: string;
  summarize(prompt: string): Promise<string>;
}

export class SummarizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SummarizerError';
  }
}

export const SUMMARIZER = Symbol('SUMMARIZER');
