// Narrative report generation via the Anthropic messages API

import Anthropic from '@anthropic-ai/sdk';
import { CancelledError, ProviderError, errorMessage, throwIfAborted } from '../utils/errors.js';
import { REPORT_SYSTEM_PROMPT, buildReportPrompt } from '../utils/report-prompt.js';
import type { CallOptions, ReportContext, ReportGenerator } from './types.js';

export interface ReportRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

/** The slice of `Anthropic#messages` the generator depends on. */
export interface MessagesApi {
  create(
    body: ReportRequest,
    options?: { signal?: AbortSignal },
  ): PromiseLike<{ content: ReadonlyArray<{ type: string; text?: string }> }>;
}

export interface AnthropicReportOptions {
  model: string;
  maxTokens: number;
}

export class AnthropicReportGenerator implements ReportGenerator {
  constructor(
    private readonly messages: MessagesApi,
    private readonly options: AnthropicReportOptions,
  ) {}

  /** SDK retries are disabled; the orchestrator owns retry policy. */
  static fromApiKey(apiKey: string, options: AnthropicReportOptions): AnthropicReportGenerator {
    const client = new Anthropic({ apiKey, maxRetries: 0 });
    return new AnthropicReportGenerator(client.messages, options);
  }

  async generateReport(context: ReportContext, options: CallOptions = {}): Promise<string> {
    const { signal } = options;
    throwIfAborted(signal);

    let response: { content: ReadonlyArray<{ type: string; text?: string }> };
    try {
      response = await this.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system: REPORT_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildReportPrompt(context) }],
        },
        { signal },
      );
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      throw new ProviderError('report', `Report generation failed: ${errorMessage(err)}`, { cause: err });
    }

    const text = response.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('\n')
      .trim();
    if (!text) {
      throw new ProviderError('report', 'Report generator returned an empty narrative');
    }
    return text;
  }
}
