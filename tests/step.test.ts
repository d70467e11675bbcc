import { Step } from '../src/application/workflow/Step.js';
import { NotASequenceError } from '../src/core/errors/WorkflowErrors.js';
import { collect, sleep } from './helpers.js';

const failOdd = (x: number) => {
  if (x % 2 === 1) {
    throw new Error(`odd: ${x}`);
  }
  return x;
};

describe('Step', () => {
  describe('run', () => {
    it('should wrap a plain function', async () => {
      const inc = Step.from((x: number) => x + 1);
      await expect(inc.run(1)).resolves.toBe(2);
    });

    it('should raise from run whatever the error mode', async () => {
      const step = Step.from(failOdd, { errorMode: 'pass' });
      await expect(step.run(1)).rejects.toThrow('odd: 1');
    });

    it('should turn failures into no-output under pass', async () => {
      const step = Step.from(failOdd, { errorMode: 'pass' });
      const outcome = await step.runOne(3);

      expect(outcome.kind).toBe('no-output');
    });

    it('should raise from runOne under raise', async () => {
      await expect(Step.from(failOdd).runOne(3)).rejects.toThrow('odd: 3');
    });
  });

  describe('Combinators', () => {
    it('should map the output', async () => {
      const step = Step.from((x: number) => x + 1).map((x) => x * 2);
      await expect(step.run(3)).resolves.toBe(8);
    });

    it('should chain steps with pipe', async () => {
      const step = Step.from((s: string) => s.length).pipe(Step.from((n: number) => n * 10));
      await expect(step.run('abc')).resolves.toBe(30);
    });

    it('should compose associatively', async () => {
      const a = Step.from((x: number) => x + 1);
      const b = Step.from((x: number) => x * 3);
      const c = Step.from((x: number) => x - 2);

      const left = a.pipe(b).pipe(c);
      const right = a.pipe(b.pipe(c));

      const inputs = [0, 1, 2, 5];
      await expect(left.runBatch(inputs)).resolves.toEqual([1, 4, 7, 16]);
      await expect(right.runBatch(inputs)).resolves.toEqual([1, 4, 7, 16]);
    });

    it('should flat-map over list outputs', async () => {
      const range = Step.from((n: number) => Array.from({ length: n }, (_, i) => i));
      const step = range.flatMap(Step.from((i: number) => i * 10));

      await expect(step.run(3)).resolves.toEqual([0, 10, 20]);
    });

    it('should drop failing elements of a flat-map under pass', async () => {
      const step = Step.from((n: number) => [n, n + 1, n + 2]).flatMap(Step.from(failOdd, { errorMode: 'pass' }));

      await expect(step.run(1)).resolves.toEqual([2]);
    });

    it('should return an empty list when no element survives', async () => {
      const step = Step.from(() => [1, 3]).flatMap(Step.from(failOdd, { errorMode: 'pass' }));

      await expect(step.run(undefined)).resolves.toEqual([]);
    });

    it('should raise on a flat-map over a non-list in both modes', async () => {
      const notAList = Step.from((x: number): unknown => x);
      const identity = Step.from((item: unknown) => item);

      const raising = notAList.flatMap(identity);
      const passing = notAList.flatMap(identity, { errorMode: 'pass' });

      await expect(raising.run(1)).rejects.toThrow(NotASequenceError);
      await expect(passing.runOne(1)).rejects.toThrow('Expected an array, got number');
      await expect(passing.runBatch([1, 2])).rejects.toThrow(NotASequenceError);
    });

    it('should inherit the error mode unless overridden', async () => {
      const passing = Step.from((x: number) => x, { errorMode: 'pass' });

      const inherited = passing.map(failOdd);
      const overridden = passing.map(failOdd, { errorMode: 'raise' });

      expect(inherited.errorMode).toBe('pass');
      await expect(inherited.runBatch([1, 2, 3, 4])).resolves.toEqual([2, 4]);
      await expect(overridden.runBatch([1, 2])).rejects.toThrow('odd: 1');
    });

    it('should drop composed items that fail in either stage under pass', async () => {
      const first = Step.from((x: number) => {
        if (x === 0) throw new Error('zero');
        return x;
      });
      const step = first.pipe(Step.from(failOdd), { errorMode: 'pass' });

      await expect(step.runBatch([0, 1, 2, 3, 4])).resolves.toEqual([2, 4]);
    });
  });

  describe('Batches and streams', () => {
    it('should keep input order in a raise-mode batch', async () => {
      const step = Step.from(async (ms: number) => {
        await sleep(ms);
        return ms;
      });

      await expect(step.runBatch([30, 10, 20])).resolves.toEqual([30, 10, 20]);
    });

    it('should return exactly the succeeding subset under pass', async () => {
      const step = Step.from(failOdd, { errorMode: 'pass' });
      const results = await step.runBatch([1, 2, 3, 4, 5, 6]);

      expect([...results].sort((a, b) => a - b)).toEqual([2, 4, 6]);
    });

    it('should raise the failure from a raise-mode batch', async () => {
      await expect(Step.from(failOdd).runBatch([2, 4, 5])).rejects.toThrow('odd: 5');
    });

    it('should stream results in completion order', async () => {
      const step = Step.from(async (ms: number) => {
        await sleep(ms);
        return ms;
      });

      await expect(collect(step.runStream([60, 10, 30]))).resolves.toEqual([10, 30, 60]);
    });

    it('should accept async iterables', async () => {
      async function* numbers() {
        yield 1;
        yield 2;
        yield 3;
      }

      const results = await collect(Step.from((x: number) => x * 2).runStream(numbers()));
      expect([...results].sort((a, b) => a - b)).toEqual([2, 4, 6]);
    });

    it('should skip failures in a pass-mode stream', async () => {
      const results = await collect(Step.from(failOdd, { errorMode: 'pass' }).streamBatch([1, 2, 3, 4]));
      expect([...results].sort((a, b) => a - b)).toEqual([2, 4]);
    });

    it('should raise from a raise-mode stream', async () => {
      await expect(collect(Step.from(failOdd).runStream([2, 3]))).rejects.toThrow('odd: 3');
    });

    it('should run the same input many times', async () => {
      let calls = 0;
      const step = Step.from((word: string) => {
        calls++;
        return word.toUpperCase();
      });

      await expect(step.runMany(3, 'hi')).resolves.toEqual(['HI', 'HI', 'HI']);
      await expect(collect(step.streamMany(2, 'yo'))).resolves.toEqual(['YO', 'YO']);
      expect(calls).toBe(5);
    });

    it('should run batch items concurrently', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const step = Step.from(async (x: number) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await sleep(10);
        inFlight--;
        return x;
      });

      await step.runBatch([1, 2, 3, 4]);
      expect(maxInFlight).toBe(4);
    });
  });

  describe('describe', () => {
    const double = Step.from(function double(x: number) {
      return x * 2;
    });
    const inc = Step.from(function inc(x: number) {
      return x + 1;
    });

    it('should use the function name', () => {
      expect(double.describe()).toBe('double');
    });

    it('should prefer an explicit name', () => {
      expect(Step.from((x: number) => x, { name: 'identity' }).describe()).toBe('identity');
    });

    it('should describe composed pipelines', () => {
      expect(double.pipe(inc).describe()).toBe('double | inc');
      expect(
        double
          .map(function half(x: number) {
            return x / 2;
          })
          .describe()
      ).toBe('double |> map(half)');
      expect(Step.from((n: number) => [n]).flatMap(inc).describe()).toBe('FunctionStep ⨂ inc');
    });
  });
});
