import { describe, expect, it } from 'vitest';
import {
  LearningBlockGenerator,
  buildGenerationPrompt,
  parseGenerationResponse,
  stripCodeFences,
} from './generation';
import { buildContext } from './retrieval';
import { ScriptedLLM, validLearningBlock } from '../__fixtures__/fakes';

describe('stripCodeFences', () => {
  it('removes a json fence', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('removes a bare fence', () => {
    expect(stripCodeFences('  ```\n{"a":1}\n```  ')).toBe('{"a":1}');
  });

  it('leaves unfenced text alone', () => {
    expect(stripCodeFences(' {"a":1} ')).toBe('{"a":1}');
  });
});

describe('parseGenerationResponse', () => {
  it('accepts a valid learning block', () => {
    const outcome = parseGenerationResponse(JSON.stringify(validLearningBlock()));
    expect(outcome).toEqual({ status: 'success', artifact: validLearningBlock() });
  });

  it('accepts a fenced learning block', () => {
    const outcome = parseGenerationResponse('```json\n' + JSON.stringify(validLearningBlock()) + '\n```');
    expect(outcome.status).toBe('success');
  });

  it('reports an empty response', () => {
    expect(parseGenerationResponse('   ')).toEqual({
      status: 'error',
      error: { kind: 'empty_response', message: 'Model returned an empty response' },
    });
  });

  it('reports invalid JSON', () => {
    const outcome = parseGenerationResponse('Sure! Here is your block: {');
    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('invalid_json');
    }
  });

  it('reports schema violations with their paths', () => {
    const block = { ...validLearningBlock(), dailyFive: ['only one'] };
    const outcome = parseGenerationResponse(JSON.stringify(block));

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('schema_violation');
      expect(outcome.error.issues).toEqual(['dailyFive: Array must contain exactly 5 element(s)']);
    }
  });

  it('rejects a quiz answer outside A-D', () => {
    const block = validLearningBlock();
    const outcome = parseGenerationResponse(
      JSON.stringify({ ...block, quiz: [{ ...block.quiz[0], correct: 'E' }] })
    );

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('schema_violation');
      expect(outcome.error.issues?.[0]).toMatch(/^quiz\.0\.correct: /);
    }
  });

  it('reports a non-object payload at the root', () => {
    const outcome = parseGenerationResponse('[]');
    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.issues?.[0]).toMatch(/^\(root\): /);
    }
  });
});

describe('buildGenerationPrompt', () => {
  it('includes the grounding text when there is context', () => {
    const context = buildContext(
      'entropy',
      [
        {
          chunkId: 'thermo#0',
          score: 0.9,
          metadata: { documentId: 'thermo', sequence: 0, text: 'Entropy never decreases.', startOffset: 0, endOffset: 24 },
        },
      ],
      4000
    );

    const prompt = buildGenerationPrompt({ topic: 'Entropy', level: 'beginner', objective: 'exam prep', context });

    expect(prompt).toContain('Source material (use it as the primary reference):\nEntropy never decreases.\n\n');
    expect(prompt).toContain('Topic: Entropy\nLevel: beginner\nObjective: exam prep');
  });

  it('omits the grounding section for an empty context', () => {
    const prompt = buildGenerationPrompt({
      topic: 'Entropy',
      level: 'advanced',
      objective: 'research',
      context: buildContext('entropy', [], 4000),
    });

    expect(prompt).not.toContain('Source material');
  });
});

describe('LearningBlockGenerator', () => {
  it('asks the model for JSON and returns the parsed block', async () => {
    const llm = new ScriptedLLM([JSON.stringify(validLearningBlock())]);
    const generator = new LearningBlockGenerator(llm);

    const outcome = await generator.generate({ topic: 'Entropy', level: 'intermediate', objective: 'understand' });

    expect(outcome).toEqual({ status: 'success', artifact: validLearningBlock() });
    expect(llm.prompts).toHaveLength(1);
    expect(llm.options[0]).toMatchObject({ jsonMode: true, temperature: 0.3 });
  });

  it('returns a structured error for an unusable reply', async () => {
    const llm = new ScriptedLLM(['not json']);
    const generator = new LearningBlockGenerator(llm);

    const outcome = await generator.generate({ topic: 'Entropy', level: 'intermediate', objective: 'understand' });

    expect(outcome.status).toBe('error');
  });

  it('propagates a failed model call', async () => {
    const generator = new LearningBlockGenerator(new ScriptedLLM([]));

    await expect(
      generator.generate({ topic: 'Entropy', level: 'intermediate', objective: 'understand' })
    ).rejects.toThrow('ScriptedLLM has no reply left');
  });
});
