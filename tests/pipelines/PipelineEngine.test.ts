import { describe, it, expect } from 'vitest';
import {
  Pipeline,
  PipelineStep,
  failedSteps,
  successfulSteps,
  type PipelineContext,
} from '../../src/server/pipelines/PipelineEngine.js';

class AddStep extends PipelineStep<number, number> {
  constructor(name: string, private readonly amount: number) {
    super(name);
  }

  validateInput(input: unknown): input is number {
    return typeof input === 'number';
  }

  process(input: number, context: PipelineContext): number {
    context[this.name] = true;
    return input + this.amount;
  }
}

class FailStep extends PipelineStep<number, number> {
  constructor(name: string) {
    super(name);
  }

  process(): number {
    throw new Error('boom');
  }
}

class ToWordsStep extends PipelineStep<number, string[]> {
  constructor() {
    super('ToWords');
  }

  process(input: number): string[] {
    return Array.from({ length: input }, (_, i) => `w${i}`);
  }
}

describe('Pipeline', () => {
  it('runs every step in order and returns the last output', async () => {
    const pipeline = Pipeline.create<number>('math')
      .addStep(new AddStep('Add1', 1))
      .addStep(new AddStep('Add10', 10));

    const result = await pipeline.run(5);

    expect(result.success).toBe(true);
    expect(result.data).toBe(16);
    expect(result.steps.map((s) => s.stepName)).toEqual(['Add1', 'Add10']);
    expect(result.steps.every((s) => s.status === 'success')).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.metadata).toEqual({ pipelineName: 'math', totalSteps: 2, completedSteps: 2 });
  });

  it('records input and output sizes', async () => {
    const result = await Pipeline.create<number>('words').addStep(new ToWordsStep()).run(3);

    expect(result.data).toEqual(['w0', 'w1', 'w2']);
    expect(result.steps[0].inputSize).toBeUndefined();
    expect(result.steps[0].outputSize).toBe(3);
  });

  it('stops at the first failure when stopOnError is set', async () => {
    const pipeline = Pipeline.create<number>('halting')
      .addStep(new AddStep('First', 1))
      .addStep(new FailStep('Broken'))
      .addStep(new AddStep('Third', 1));

    const result = await pipeline.run(0, {}, true);

    expect(result.success).toBe(false);
    expect(result.data).toBeUndefined();
    expect(result.steps).toHaveLength(2);
    expect(result.steps[1].status).toBe('failed');
    expect(result.steps[1].error).toBe('boom');
    expect(result.errors).toEqual(['Broken: boom']);
    expect(result.lastOutput).toBe(1);
    expect(result.metadata.completedSteps).toBe(1);
  });

  it('continues with the last successful output when stopOnError is off', async () => {
    const context: PipelineContext = {};
    const pipeline = Pipeline.create<number>('continuing')
      .addStep(new AddStep('First', 1))
      .addStep(new FailStep('Broken'))
      .addStep(new AddStep('Third', 5));

    const result = await pipeline.run(0, context, false);

    expect(result.success).toBe(false);
    expect(result.data).toBeUndefined();
    expect(result.steps.map((s) => s.status)).toEqual(['success', 'failed', 'success']);
    expect(result.lastOutput).toBe(6);
    expect(context).toEqual({ First: true, Third: true });
    expect(failedSteps(result)).toHaveLength(1);
    expect(successfulSteps(result)).toHaveLength(2);
  });

  it('fails a step whose input does not validate without processing it', async () => {
    const pipeline = Pipeline.create<number>('validating').addStep(new ToWordsStep());
    // A step typed on arrays receives a number here through the untyped run input
    const strict = Pipeline.create<string[]>('strict').addStep(
      new (class extends PipelineStep<string[], number> {
        constructor() {
          super('Count');
        }
        validateInput(input: unknown): input is string[] {
          return Array.isArray(input);
        }
        process(input: string[]): number {
          return input.length;
        }
      })()
    );

    const ok = await pipeline.run(2);
    const rejected = await strict.run(JSON.parse('"not an array"'));

    expect(ok.success).toBe(true);
    expect(rejected.success).toBe(false);
    expect(rejected.errors).toEqual(['Count: Invalid input for step: Count']);
    expect(rejected.steps[0].outputSize).toBeUndefined();
  });

  it('shares one context object across steps', async () => {
    const context: PipelineContext = { seed: 1 };
    await Pipeline.create<number>('ctx').addStep(new AddStep('A', 1)).addStep(new AddStep('B', 1)).run(0, context);
    expect(context).toEqual({ seed: 1, A: true, B: true });
  });

  it('returns the input unchanged for an empty pipeline', async () => {
    const result = await Pipeline.create<number>('empty').run(7);
    expect(result.success).toBe(true);
    expect(result.data).toBe(7);
    expect(result.steps).toEqual([]);
  });
});
