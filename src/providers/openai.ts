import OpenAI from 'openai';
import type { AnalysisProvider, AnalysisRequest } from '../analysis/provider.js';
import { parseJudgment } from '../analysis/rubric.js';
import { AnalysisUnavailableError } from '../core/errors.js';
import type { RiskJudgment } from '../core/types.js';

/** Narrow view of a chat model: one system and one user message in, raw text out. */
export interface CompletionClient {
  complete(system: string, user: string, signal?: AbortSignal): Promise<string | null>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIClientOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs });
  }

  async complete(system: string, user: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.client.chat.completions.create(
      {
        model: this.options.model,
        temperature: this.options.temperature,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        response_format: { type: 'json_object' },
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? null;
  }
}

const SYSTEM_PROMPT = `You are an expert financial analyst comparing the "Item 1A. Risk Factors"
sections of two consecutive annual reports (Form 10-K) filed by the same company.

You receive one passage from the prior year and the matching passage from the current year.
Either passage may be empty when the text has no counterpart in the other year.

Respond with ONLY a JSON object in this exact format:
{
  "severityDelta": 0,
  "addedThemes": ["theme"],
  "removedThemes": ["theme"],
  "intensifiedThemes": ["theme"],
  "rationale": "one or two sentences"
}`;

export function buildUserPrompt(request: AnalysisRequest): string {
  const { rubric } = request;
  return [
    `Company: ${request.company}`,
    `Scoring: ${rubric.guidance}`,
    `severityDelta must be a number from ${rubric.scale.min} to ${rubric.scale.max}; ${rubric.scale.baseline} means no change.`,
    `Use theme labels from: ${rubric.themes.join(', ')}.`,
    '',
    `Prior year (${request.priorYear}):`,
    request.priorText || '(no corresponding passage)',
    '',
    `Current year (${request.currentYear}):`,
    request.currentText || '(no corresponding passage)',
  ].join('\n');
}

export class OpenAIAnalysisProvider implements AnalysisProvider {
  readonly name = 'openai';

  constructor(private readonly client: CompletionClient) {}

  async judge(request: AnalysisRequest, signal?: AbortSignal): Promise<RiskJudgment> {
    const raw = await this.client.complete(SYSTEM_PROMPT, buildUserPrompt(request), signal);
    if (!raw) {
      throw new AnalysisUnavailableError('LLM returned empty response');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new AnalysisUnavailableError(`LLM returned invalid JSON: ${raw.slice(0, 200)}`, undefined, err);
    }

    return parseJudgment(parsed, request.rubric);
  }
}
