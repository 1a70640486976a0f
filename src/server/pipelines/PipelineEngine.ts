/**
 * Pipeline Engine
 *
 * Runs an ordered list of steps over a value, recording per-step status, timing
 * and data sizes. Used by document ingestion and by the query funnel.
 *
 * A failing step is recorded as `failed`. With `stopOnError` the remaining steps
 * are neither executed nor recorded; without it the next step receives the last
 * successful output. Steps are never retried.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import { PipelineValidationError, errorMessage } from '../types/errors.js';

export type StepStatus = 'pending' | 'running' | 'success' | 'failed' | 'skipped';

/**
 * Mutable record shared by reference across all steps of one run.
 * Meant for cross-cutting counters; typed data flows through step outputs.
 */
export type PipelineContext = Record<string, unknown>;

export interface StepResult {
  readonly stepName: string;
  readonly status: StepStatus;
  readonly durationMs: number;
  readonly inputSize?: number;
  readonly outputSize?: number;
  readonly error?: string;
  readonly stack?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface PipelineResult<TOut> {
  success: boolean;
  /** Output of the last step, present only when the whole run succeeded */
  data: TOut | undefined;
  /** Output of the last successful step (the input when none succeeded) */
  lastOutput: unknown;
  steps: StepResult[];
  totalDurationMs: number;
  startedAt: string;
  completedAt: string;
  /** One entry per failed step: `"<step name>: <message>"` */
  errors: string[];
  metadata: {
    pipelineName: string;
    totalSteps: number;
    completedSteps: number;
  };
}

export function failedSteps(result: PipelineResult<unknown>): StepResult[] {
  return result.steps.filter((s) => s.status === 'failed');
}

export function successfulSteps(result: PipelineResult<unknown>): StepResult[] {
  return result.steps.filter((s) => s.status === 'success');
}

/**
 * Base class for pipeline steps
 */
export abstract class PipelineStep<TIn, TOut> {
  protected readonly logger: Logger;

  constructor(public readonly name: string) {
    this.logger = createChildLogger({ step: name });
  }

  abstract process(input: TIn, context: PipelineContext): Promise<TOut> | TOut;

  /**
   * Checked before `process`; a false result fails the step without processing.
   * Receives whatever the previous step produced.
   */
  validateInput(_input: unknown): _input is TIn {
    return true;
  }

  /**
   * Size used in step records: element count for collections, length for strings
   * and byte buffers, key count for plain objects
   */
  getDataSize(data: unknown): number | undefined {
    if (data === null || data === undefined) {
      return 0;
    }
    if (Array.isArray(data) || typeof data === 'string' || data instanceof Uint8Array) {
      return data.length;
    }
    if (data instanceof Map || data instanceof Set) {
      return data.size;
    }
    if (typeof data === 'object' && Object.getPrototypeOf(data) === Object.prototype) {
      return Object.keys(data).length;
    }
    return undefined;
  }

  /**
   * Extra fields recorded with a successful step
   */
  describeOutput(_output: TOut): Record<string, unknown> {
    return {};
  }
}

interface RunState {
  context: PipelineContext;
  stopOnError: boolean;
  totalSteps: number;
  results: StepResult[];
  errors: string[];
  halted: boolean;
  /** Last successful output */
  current: unknown;
}

type Outcome<T> = { ok: true; value: T } | { ok: false };

type Driver<TIn, TOut> = (input: TIn, state: RunState) => Promise<Outcome<TOut>>;

async function executeStep<TIn, TOut>(
  step: PipelineStep<TIn, TOut>,
  state: RunState,
  logger: Logger
): Promise<Outcome<TOut>> {
  const input = state.current;
  const stepStart = performance.now();
  logger.debug({ position: `${state.results.length + 1}/${state.totalSteps}`, step: step.name }, 'Running step');

  try {
    if (!step.validateInput(input)) {
      throw new PipelineValidationError(step.name, `Invalid input for step: ${step.name}`);
    }
    const inputSize = step.getDataSize(input);
    const output = await step.process(input, state.context);
    const durationMs = performance.now() - stepStart;

    const record: StepResult = {
      stepName: step.name,
      status: 'success',
      durationMs,
      inputSize,
      outputSize: step.getDataSize(output),
      metadata: Object.freeze(step.describeOutput(output)),
    };
    state.results.push(Object.freeze(record));
    logger.info({ step: step.name, durationMs: Math.round(durationMs) }, 'Step completed');
    state.current = output;
    return { ok: true, value: output };
  } catch (error) {
    const durationMs = performance.now() - stepStart;
    const message = errorMessage(error);
    const record: StepResult = {
      stepName: step.name,
      status: 'failed',
      durationMs,
      error: message,
      stack: error instanceof Error ? error.stack : undefined,
      metadata: Object.freeze({}),
    };
    state.results.push(Object.freeze(record));
    state.errors.push(`${step.name}: ${message}`);
    logger.error({ step: step.name, error }, 'Step failed');

    if (state.stopOnError) {
      state.halted = true;
    }
    return { ok: false };
  }
}

/**
 * Ordered pipeline. `addStep` returns a pipeline typed on the new output, so a
 * step whose input does not match the previous output does not compile.
 *
 * ```typescript
 * const pipeline = Pipeline.create<Buffer>('ingestion')
 *   .addStep(new PdfLoaderStep(source))
 *   .addStep(new TextExtractorStep());
 * const result = await pipeline.run(pdfBytes);
 * ```
 */
export class Pipeline<TIn, TOut> {
  private readonly logger: Logger;

  private constructor(
    public readonly name: string,
    public readonly stepNames: readonly string[],
    private readonly drive: Driver<TIn, TOut>
  ) {
    this.logger = createChildLogger({ pipeline: name });
  }

  static create<T>(name: string): Pipeline<T, T> {
    return new Pipeline<T, T>(name, [], async (input) => ({ ok: true, value: input }));
  }

  addStep<TNext>(step: PipelineStep<TOut, TNext>): Pipeline<TIn, TNext> {
    const previous = this.drive;
    const logger = this.logger;
    return new Pipeline<TIn, TNext>(this.name, [...this.stepNames, step.name], async (input, state) => {
      await previous(input, state);
      if (state.halted) {
        return { ok: false };
      }
      return executeStep(step, state, logger);
    });
  }

  async run(input: TIn, context: PipelineContext = {}, stopOnError: boolean = true): Promise<PipelineResult<TOut>> {
    const startedAt = new Date();
    const pipelineStart = performance.now();
    const state: RunState = {
      context,
      stopOnError,
      totalSteps: this.stepNames.length,
      results: [],
      errors: [],
      halted: false,
      current: input,
    };

    this.logger.info({ steps: this.stepNames.length, stopOnError }, 'Starting pipeline');

    const outcome = await this.drive(input, state);

    const totalDurationMs = performance.now() - pipelineStart;
    const success = state.errors.length === 0;
    const completedSteps = state.results.filter((s) => s.status === 'success').length;

    if (success) {
      this.logger.info({ totalDurationMs: Math.round(totalDurationMs) }, 'Pipeline completed successfully');
    } else {
      this.logger.error({ errors: state.errors, completedSteps }, 'Pipeline failed');
    }

    return {
      success,
      data: success && outcome.ok ? outcome.value : undefined,
      lastOutput: state.current,
      steps: state.results,
      totalDurationMs,
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
      errors: state.errors,
      metadata: {
        pipelineName: this.name,
        totalSteps: this.stepNames.length,
        completedSteps,
      },
    };
  }
}
