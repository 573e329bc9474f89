import type { EmbeddingCache } from '../services/embedding';
import type { EmbeddingProvider } from '../utils/embeddings';
import type { LLMClient, LLMOptions } from '../utils/llm';
import { RetryPolicy, type RetryPolicyOptions, type Sleep } from '../utils/retry';

/**
 * In-process stand-ins for the upstream services used by the tests.
 */

export const KEYWORDS = ['heat', 'energy', 'entropy', 'cell', 'protein', 'orbit'] as const;

/**
 * One dimension per keyword; the value is how often it occurs.
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((keyword) => lower.split(keyword).length - 1);
}

type Step = Error | ((texts: string[]) => number[][] | Promise<number[][]>);

export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension = KEYWORDS.length;
  readonly calls: string[][] = [];
  private readonly script: Step[] = [];

  constructor(modelId = 'keyword-test') {
    this.modelId = modelId;
  }

  /**
   * Queue behaviour for the next calls; once the queue is empty every call
   * returns keyword vectors.
   */
  enqueue(...steps: Step[]): this {
    this.script.push(...steps);
    return this;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    const step = this.script.shift();
    if (step instanceof Error) {
      throw step;
    }
    if (step) {
      return step(texts);
    }
    return texts.map(keywordVector);
  }
}

export class MemoryEmbeddingCache implements EmbeddingCache {
  readonly store = new Map<string, number[]>();

  async getMany(modelId: string, texts: readonly string[]): Promise<Array<number[] | null>> {
    return texts.map((text) => this.store.get(`${modelId}:${text}`) ?? null);
  }

  async setMany(modelId: string, entries: ReadonlyArray<{ text: string; vector: number[] }>): Promise<void> {
    for (const { text, vector } of entries) {
      this.store.set(`${modelId}:${text}`, vector);
    }
  }
}

export class ScriptedLLM implements LLMClient {
  readonly model = 'scripted-llm';
  readonly prompts: string[] = [];
  readonly options: LLMOptions[] = [];

  constructor(private readonly replies: string[]) {}

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedLLM has no reply left');
    }
    return reply;
  }
}

export const noSleep: Sleep = async () => {};

/**
 * No real delays; random fixed at 0.5 so jitter cancels out.
 */
export function testRetryPolicy(overrides: RetryPolicyOptions = {}): RetryPolicy {
  return new RetryPolicy({ sleep: noSleep, random: () => 0.5, ...overrides });
}

export function validLearningBlock() {
  return {
    title: 'Entropy',
    summary: 'Entropy measures how spread out energy is. It never decreases in an isolated system.',
    keyFormulas: ['\\Delta S = \\frac{Q}{T}'],
    analogy: 'A tidy room drifts toward mess unless you spend effort.',
    dailyFive: ['S is a state function', 'Units are J/K', 'Isolated systems: dS >= 0', 'Reversible: dS = dQ/T', 'Mixing raises entropy'],
    quiz: [
      {
        question: 'What happens to the entropy of an isolated system?',
        options: ['It decreases', 'It never decreases', 'It oscillates', 'It is always zero'],
        correct: 'B',
        explanation: 'The second law forbids a decrease.',
      },
    ],
  };
}
