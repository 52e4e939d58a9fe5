import { WalkGenerator } from '../WalkGenerator';
import { RandomStream } from '../../random/RandomStream';
import { InvalidParameterError, SimulationErrorCode } from '../../models/errors';

function sampleVariance(values: number[]): number {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
}

describe('WalkGenerator', () => {
  let stream: RandomStream;
  let generator: WalkGenerator;

  beforeEach(() => {
    stream = RandomStream.fromSeed(42);
    generator = new WalkGenerator(stream);
  });

  test('should return a flat walk when sd is zero', () => {
    expect(generator.generate(70, 5, 0)).toEqual([70, 70, 70, 70, 70]);
  });

  test('should return exactly numSteps samples', () => {
    for (const numSteps of [1, 2, 10, 101]) {
      expect(generator.generate(0, numSteps, 1)).toHaveLength(numSteps);
    }
  });

  test('should start every walk at the initial value', () => {
    for (let i = 0; i < 20; i++) {
      expect(generator.generate(-3.25, 8, 5)[0]).toBe(-3.25);
    }
  });

  test('should return the single initial value without drawing when numSteps is 1', () => {
    expect(generator.generate(12, 1, 2)).toEqual([12]);
    expect(stream.draws).toBe(0);
  });

  test('should consume numSteps - 1 draws from the stream', () => {
    generator.generate(0, 10, 1);
    expect(stream.draws).toBe(9);

    generator.generate(0, 4, 1);
    expect(stream.draws).toBe(12);
  });

  test('should add one Normal(0, sd) increment per step', () => {
    const walk = generator.generate(10, 6, 2);

    const replay = RandomStream.fromSeed(42);
    const expected = [10];
    for (let i = 1; i < 6; i++) {
      expected.push(expected[i - 1] + replay.normal(2));
    }

    expect(walk).toEqual(expected);
  });

  test('should be reproducible from an identically seeded stream', () => {
    const first = new WalkGenerator(RandomStream.fromSeed(2024)).generate(70, 50, 1.5);
    const second = new WalkGenerator(RandomStream.fromSeed(2024)).generate(70, 50, 1.5);

    expect(first).toEqual(second);
  });

  test('should return a frozen walk', () => {
    expect(Object.isFrozen(generator.generate(0, 3, 1))).toBe(true);
  });

  test('should follow the increment variance law', () => {
    const sd = 2;
    const walks = Array.from({ length: 4000 }, () => generator.generate(0, 11, sd));

    for (const step of [5, 10]) {
      const displacements = walks.map(walk => walk[step] - walk[0]);
      const expected = step * sd * sd;
      const relativeError = Math.abs(sampleVariance(displacements) - expected) / expected;
      expect(relativeError).toBeLessThan(0.1);
    }
  });

  test('should reject numSteps of zero', () => {
    expect(() => generator.generate(0, 0, 1)).toThrow(InvalidParameterError);
  });

  test('should reject non-integer numSteps', () => {
    expect(() => generator.generate(0, 2.5, 1)).toThrow(InvalidParameterError);
  });

  test('should reject a negative sd', () => {
    try {
      generator.generate(0, 5, -1);
      throw new Error('expected generate to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      if (error instanceof InvalidParameterError) {
        expect(error.code).toBe(SimulationErrorCode.INVALID_PARAMETER);
        expect(error.parameter).toBe('sd');
      }
    }
  });

  test('should not draw from the stream when parameters are invalid', () => {
    expect(() => generator.generate(0, 5, Number.NaN)).toThrow(InvalidParameterError);
    expect(stream.draws).toBe(0);
  });
});
