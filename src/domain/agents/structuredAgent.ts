import { z } from 'zod';
import { LLMClient } from '../../services/llm';
import { createLogger } from '../../utils/logger';
import { StructuredOutputError } from '../services/exceptions';

const logger = createLogger('Agents');

export interface AgentOptions {
  name: string;
  systemPrompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface StructuredAgentOptions extends AgentOptions {
  /** Extra requests made after a reply that cannot be parsed or validated. Defaults to 1. */
  maxOutputRetries?: number;
}

const DEFAULT_OUTPUT_RETRIES = 1;

export const outputRetryPrompt = (prompt: string, reason: string): string =>
  `${prompt}\n\nYour previous reply could not be used: ${reason}\n` +
  'Reply again with only a JSON object in the required format.';

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Pulls the first JSON object out of a model reply, tolerating code fences
 * and prose around it.
 */
export function extractJsonObject(agentName: string, text: string): unknown {
  const trimmed = text.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  const body = fenced ? fenced[1] : trimmed;

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new StructuredOutputError(agentName, 'no JSON object found', text);
  }

  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    throw new StructuredOutputError(agentName, error instanceof Error ? error.message : String(error), text);
  }
}

/**
 * A model call whose reply must validate against a zod schema. A rejected
 * reply is requested again with the reason appended, up to `maxOutputRetries`
 * times, before `StructuredOutputError` is thrown.
 */
export class StructuredAgent<S extends z.ZodTypeAny> {
  constructor(
    private llm: LLMClient,
    private schema: S,
    private options: StructuredAgentOptions,
  ) {}

  get name(): string {
    return this.options.name;
  }

  async run(prompt: string): Promise<z.output<S>> {
    const maxOutputRetries = this.options.maxOutputRetries ?? DEFAULT_OUTPUT_RETRIES;
    let attemptPrompt = prompt;

    for (let attempt = 0; ; attempt++) {
      const raw = await this.llm.complete({
        system: this.options.systemPrompt,
        prompt: attemptPrompt,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        json: true,
      });

      try {
        return this.parse(raw);
      } catch (error) {
        if (!(error instanceof StructuredOutputError) || attempt >= maxOutputRetries) {
          throw error;
        }
        logger.warn(`Agent '${this.options.name}' reply rejected (attempt ${attempt + 1}): ${error.reason}`);
        attemptPrompt = outputRetryPrompt(prompt, error.reason);
      }
    }
  }

  private parse(raw: string): z.output<S> {
    const parsed = this.schema.safeParse(extractJsonObject(this.options.name, raw));
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StructuredOutputError(this.options.name, issues, raw);
    }
    return parsed.data;
  }
}

/** A model call returning free text. */
export class TextAgent {
  constructor(
    private llm: LLMClient,
    private options: AgentOptions,
  ) {}

  async run(prompt: string): Promise<string> {
    const reply = await this.llm.complete({
      system: this.options.systemPrompt,
      prompt,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });
    logger.debug(`Agent '${this.options.name}' replied with ${reply.length} characters`);
    return reply;
  }
}
