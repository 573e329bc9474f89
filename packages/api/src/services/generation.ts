import { z } from 'zod';
import type { GenerationContext } from '@eduflow/shared';
import type { LLMClient } from '../utils/llm';
import { logger as rootLogger, type Logger } from '../utils/logger';

/**
 * Learning Block Generation (boundary to the external model)
 *
 * The model is asked for a JSON learning block. Its reply is untrusted: it
 * goes through parseGenerationResponse, which yields a tagged union instead of
 * throwing, so callers handle a bad reply the same way as a good one.
 */

export const QuizItemSchema = z.object({
  question: z.string().min(1),
  options: z.array(z.string().min(1)).length(4),
  correct: z.enum(['A', 'B', 'C', 'D']),
  explanation: z.string().min(1),
});

export const LearningBlockSchema = z.object({
  title: z.string().min(1),
  summary: z.string().min(1),
  keyFormulas: z.array(z.string()),
  analogy: z.string().min(1),
  dailyFive: z.array(z.string().min(1)).length(5),
  quiz: z.array(QuizItemSchema).min(1),
});

export type QuizItem = z.infer<typeof QuizItemSchema>;
export type LearningBlock = z.infer<typeof LearningBlockSchema>;

export type GenerationErrorKind = 'empty_response' | 'invalid_json' | 'schema_violation';

export type GenerationOutcome =
  | { status: 'success'; artifact: LearningBlock }
  | { status: 'error'; error: { kind: GenerationErrorKind; message: string; issues?: string[] } };

export const LEARNER_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export type LearnerLevel = (typeof LEARNER_LEVELS)[number];

export interface GenerationRequest {
  topic: string;
  level: LearnerLevel;
  objective: string;
  context?: GenerationContext;
}

/**
 * Remove a surrounding ```json ... ``` fence if the model added one.
 */
export function stripCodeFences(text: string): string {
  const fenced = text.trim().match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i);
  return (fenced ? fenced[1] : text).trim();
}

export function parseGenerationResponse(raw: string): GenerationOutcome {
  const body = stripCodeFences(raw);
  if (body.length === 0) {
    return { status: 'error', error: { kind: 'empty_response', message: 'Model returned an empty response' } };
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    return {
      status: 'error',
      error: {
        kind: 'invalid_json',
        message: `Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }

  const parsed = LearningBlockSchema.safeParse(data);
  if (!parsed.success) {
    return {
      status: 'error',
      error: {
        kind: 'schema_violation',
        message: 'Model response does not match the learning block schema',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      },
    };
  }

  return { status: 'success', artifact: parsed.data };
}

export function buildGenerationPrompt(request: GenerationRequest): string {
  const grounding =
    request.context && request.context.text.length > 0
      ? `Source material (use it as the primary reference):\n${request.context.text}\n\n`
      : '';

  return `You are a university-level tutor. Break the topic down into a short learning block.

Reply with ONLY a JSON object of this shape:
{
  "title": string,
  "summary": string (3-4 plain sentences),
  "keyFormulas": string[] (LaTeX, may be empty),
  "analogy": string,
  "dailyFive": [5 short recall points],
  "quiz": [{ "question": string, "options": [4 strings], "correct": "A" | "B" | "C" | "D", "explanation": string }]
}

${grounding}Topic: ${request.topic}
Level: ${request.level}
Objective: ${request.objective}`;
}

export class LearningBlockGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly llm: LLMClient,
    options: { logger?: Logger } = {}
  ) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'generation', model: llm.model });
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationOutcome> {
    const startTime = Date.now();
    const raw = await this.llm.generate(buildGenerationPrompt(request), {
      temperature: 0.3,
      jsonMode: true,
      signal,
    });
    const outcome = parseGenerationResponse(raw);

    if (outcome.status === 'error') {
      this.logger.warn(
        { kind: outcome.error.kind, issues: outcome.error.issues, latency: Date.now() - startTime },
        'Model returned an unusable learning block'
      );
    } else {
      this.logger.info(
        { latency: Date.now() - startTime, grounded: (request.context?.chunkIds.length ?? 0) > 0 },
        'Learning block generated'
      );
    }
    return outcome;
  }
}
