import { NotASequenceError } from '../../core/errors/WorkflowErrors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Step');

/**
 * raise: failures propagate. pass: failures become a no-output outcome and are
 * dropped from batch and stream results.
 */
export type ErrorMode = 'raise' | 'pass';

/**
 * Result of running a step once. `no-output` marks an item that failed under
 * `pass` mode; it never reaches the caller of a batch or stream.
 */
export type StepOutcome<T> =
  | { kind: 'output'; value: T }
  | { kind: 'no-output'; error: unknown };

export function isOutput<T>(outcome: StepOutcome<T>): outcome is { kind: 'output'; value: T } {
  return outcome.kind === 'output';
}

export interface StepOptions {
  name?: string;
  errorMode?: ErrorMode;
}

export type ElementOf<T> = T extends ReadonlyArray<infer E> ? E : never;

type Settled<T> =
  | { id: number; status: 'fulfilled'; outcome: StepOutcome<T> }
  | { id: number; status: 'rejected'; error: unknown };

function settle<T>(id: number, task: Promise<StepOutcome<T>>): Promise<Settled<T>> {
  return task.then(
    (outcome): Settled<T> => ({ id, status: 'fulfilled', outcome }),
    (error: unknown): Settled<T> => ({ id, status: 'rejected', error })
  );
}

function* repeat<T>(n: number, value: T): Generator<T> {
  for (let i = 0; i < n; i++) {
    yield value;
  }
}

function isSequence<E>(value: unknown): value is ReadonlyArray<E> {
  return Array.isArray(value);
}

/**
 * A named asynchronous unit of work from I to O.
 *
 * Every combinator returns a Step again, so `runBatch`, `runStream` and
 * friends behave the same on a primitive step and on a deep pipeline.
 */
export abstract class Step<I, O> {
  readonly name: string;
  readonly errorMode: ErrorMode;

  constructor(options: StepOptions = {}) {
    this.name = options.name ?? '';
    this.errorMode = options.errorMode ?? 'raise';
  }

  /**
   * Wrap a plain function as a step
   */
  static from<I, O>(fn: (input: I) => O | Promise<O>, options: StepOptions = {}): Step<I, O> {
    return new FunctionStep(fn, options);
  }

  /**
   * Run on a single input. Always raises on failure, whatever the error mode.
   */
  abstract run(input: I): Promise<O>;

  /**
   * Run on a single input, honouring the error mode. Structural errors
   * (a flat-map over something that is not a list) are raised in both modes.
   */
  async runOne(input: I): Promise<StepOutcome<O>> {
    try {
      return { kind: 'output', value: await this.run(input) };
    } catch (error) {
      if (this.errorMode === 'raise' || error instanceof NotASequenceError) {
        throw error;
      }
      logger.debug(
        `${this.describe()} produced no output: ${error instanceof Error ? error.message : String(error)}`
      );
      return { kind: 'no-output', error };
    }
  }

  /**
   * Start one task per input as inputs are read, then yield results in
   * completion order. Under `raise` the first failure aborts the stream;
   * tasks still in flight are left to finish on their own.
   */
  async *runStream(inputs: AsyncIterable<I> | Iterable<I>): AsyncGenerator<O, void, undefined> {
    const pending = new Map<number, Promise<Settled<O>>>();
    let nextId = 0;

    for await (const input of inputs) {
      const id = nextId++;
      pending.set(id, settle(id, this.runOne(input)));
    }

    while (pending.size > 0) {
      const settled = await Promise.race(pending.values());
      pending.delete(settled.id);

      if (settled.status === 'rejected') {
        throw settled.error;
      }
      if (isOutput(settled.outcome)) {
        yield settled.outcome.value;
      }
    }
  }

  /**
   * Run every input concurrently and wait for all of them.
   * Under `raise` results line up with inputs; under `pass` only the
   * surviving results are returned and positions must not be relied on.
   */
  async runBatch(inputs: Iterable<I>): Promise<O[]> {
    const outcomes = await Promise.all(Array.from(inputs, (input) => this.runOne(input)));
    return outcomes.filter(isOutput).map((outcome) => outcome.value);
  }

  streamBatch(inputs: Iterable<I>): AsyncGenerator<O, void, undefined> {
    return this.runStream(inputs);
  }

  runMany(n: number, input: I): Promise<O[]> {
    return this.runBatch(repeat(n, input));
  }

  streamMany(n: number, input: I): AsyncGenerator<O, void, undefined> {
    return this.runStream(repeat(n, input));
  }

  /**
   * Apply `fn` to this step's output. A throwing `fn` follows the new step's error mode.
   */
  map<N>(fn: (value: O) => N | Promise<N>, options: StepOptions = {}): Step<I, N> {
    return new MappedStep(this, fn, { errorMode: this.errorMode, ...options });
  }

  /**
   * Run `next` concurrently on every element of this step's (list) output
   */
  flatMap<N>(next: Step<ElementOf<O>, N>, options: StepOptions = {}): Step<I, N[]> {
    return new FlatMappedStep(this, next, { errorMode: this.errorMode, ...options });
  }

  /**
   * Chain `next` after this step
   */
  pipe<N>(next: Step<O, N>, options: StepOptions = {}): Step<I, N> {
    return new ComposedStep(this, next, { errorMode: this.errorMode, ...options });
  }

  describe(): string {
    return this.name || this.constructor.name;
  }
}

export class FunctionStep<I, O> extends Step<I, O> {
  constructor(
    private readonly fn: (input: I) => O | Promise<O>,
    options: StepOptions = {}
  ) {
    super(options);
  }

  async run(input: I): Promise<O> {
    return this.fn(input);
  }

  describe(): string {
    return this.name || this.fn.name || 'FunctionStep';
  }
}

export class MappedStep<I, M, O> extends Step<I, O> {
  constructor(
    readonly source: Step<I, M>,
    private readonly fn: (value: M) => O | Promise<O>,
    options: StepOptions = {}
  ) {
    super(options);
  }

  async run(input: I): Promise<O> {
    const intermediate = await this.source.run(input);
    return this.fn(intermediate);
  }

  describe(): string {
    return this.name || `${this.source.describe()} |> map(${this.fn.name || '<anonymous>'})`;
  }
}

export class FlatMappedStep<I, M, O> extends Step<I, O[]> {
  constructor(
    readonly source: Step<I, M>,
    readonly next: Step<ElementOf<M>, O>,
    options: StepOptions = {}
  ) {
    super(options);
  }

  async run(input: I): Promise<O[]> {
    const items = await this.source.run(input);
    if (!isSequence<ElementOf<M>>(items)) {
      throw new NotASequenceError(items);
    }

    const outcomes = await Promise.all(items.map((item) => this.next.runOne(item)));
    return outcomes.filter(isOutput).map((outcome) => outcome.value);
  }

  describe(): string {
    return this.name || `${this.source.describe()} ⨂ ${this.next.describe()}`;
  }
}

export class ComposedStep<I, M, O> extends Step<I, O> {
  constructor(
    readonly first: Step<I, M>,
    readonly second: Step<M, O>,
    options: StepOptions = {}
  ) {
    super(options);
  }

  async run(input: I): Promise<O> {
    const intermediate = await this.first.run(input);
    return this.second.run(intermediate);
  }

  describe(): string {
    return this.name || `${this.first.describe()} | ${this.second.describe()}`;
  }
}
