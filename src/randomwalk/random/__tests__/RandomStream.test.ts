import { RandomStream } from '../RandomStream';
import { InvalidParameterError } from '../../models/errors';

describe('RandomStream', () => {
  test('should produce identical sequences for identical seeds', () => {
    const a = RandomStream.fromSeed(42);
    const b = RandomStream.fromSeed(42);

    const first = Array.from({ length: 50 }, () => a.normal(1.5));
    const second = Array.from({ length: 50 }, () => b.normal(1.5));

    expect(first).toEqual(second);
  });

  test('should produce different sequences for different seeds', () => {
    const a = RandomStream.fromSeed(1);
    const b = RandomStream.fromSeed(2);

    const first = Array.from({ length: 10 }, () => a.normal());
    const second = Array.from({ length: 10 }, () => b.normal());

    expect(first).not.toEqual(second);
  });

  test('should count normal draws', () => {
    const stream = RandomStream.fromSeed(7);
    expect(stream.draws).toBe(0);

    stream.normal();
    stream.normal(3);
    stream.normal(0);

    expect(stream.draws).toBe(3);
  });

  test('should not count uniform draws as normal draws', () => {
    const stream = RandomStream.fromSeed(7);
    const u = stream.uniform();

    expect(u).toBeGreaterThanOrEqual(0);
    expect(u).toBeLessThan(1);
    expect(stream.draws).toBe(0);
  });

  test('should scale the standard normal by sd', () => {
    const a = RandomStream.fromSeed(99);
    const b = RandomStream.fromSeed(99);

    expect(a.normal(4)).toBe(4 * b.normal(1));
  });

  test('should keep the seed it was built from', () => {
    expect(RandomStream.fromSeed(123).seed).toBe(123);
    expect(Number.isInteger(RandomStream.unseeded().seed)).toBe(true);
  });

  test('should split into deterministic child streams', () => {
    const childA = RandomStream.fromSeed(5).split();
    const childB = RandomStream.fromSeed(5).split();

    expect(childA.seed).toBe(childB.seed);
    expect(childA.normal()).toBe(childB.normal());
  });

  test('should give split children their own state', () => {
    const parent = RandomStream.fromSeed(5);
    const child = parent.split();

    child.normal();
    child.normal();

    expect(child.draws).toBe(2);
    expect(parent.draws).toBe(0);
  });

  test('should reject a non-finite seed', () => {
    expect(() => RandomStream.fromSeed(Number.NaN)).toThrow(InvalidParameterError);
  });

  test('should reject a fractional seed', () => {
    expect(() => RandomStream.fromSeed(1.2)).toThrow(InvalidParameterError);
  });

  test('should reject a negative seed', () => {
    expect(() => RandomStream.fromSeed(-5)).toThrow(InvalidParameterError);
  });

  test('should reject seeds outside 32 bits', () => {
    expect(() => RandomStream.fromSeed(2 ** 32)).toThrow(InvalidParameterError);
    expect(RandomStream.fromSeed(2 ** 32 - 1).seed).toBe(2 ** 32 - 1);
  });

  test('should give neighbouring seeds distinct streams', () => {
    expect(RandomStream.fromSeed(1).normal()).not.toBe(RandomStream.fromSeed(2).normal());
    expect(RandomStream.fromSeed(0).normal()).not.toBe(RandomStream.fromSeed(1).normal());
  });
});
