import { describe, it, expect } from 'vitest';
import { metricKey, sameKey, canonicalLabels } from '../src/core/key.js';
import { InvalidLabelError, InvalidMetricNameError } from '../src/core/errors.js';

describe('metricKey', () => {
  it('ignores label insertion order', () => {
    const a = metricKey('hits', { b: '2', a: '1' });
    const b = metricKey('hits', { a: '1', b: '2' });
    expect(a.id).toBe('hits{a="1",b="2"}');
    expect(sameKey(a, b)).toBe(true);
    expect(canonicalLabels(a.labels)).toEqual([['a', '1'], ['b', '2']]);
  });

  it('uses the bare name without labels', () => {
    expect(metricKey('op').id).toBe('op');
  });

  it('distinguishes label values', () => {
    expect(sameKey(metricKey('m', { a: '1' }), metricKey('m', { a: '2' }))).toBe(false);
    expect(sameKey(metricKey('m', { a: '1' }), metricKey('m'))).toBe(false);
  });

  it('escapes label values', () => {
    expect(metricKey('m', { path: 'a"b\\c\nd' }).id).toBe(String.raw`m{path="a\"b\\c\nd"}`);
  });

  it('rejects reserved and malformed label names', () => {
    expect(() => metricKey('m', { le: '1' })).toThrow(InvalidLabelError);
    expect(() => metricKey('m', { __name__: 'x' })).toThrow(InvalidLabelError);
    expect(() => metricKey('m', { '1bad': 'x' })).toThrow(InvalidLabelError);
    expect(() => metricKey('m', { 'bad-label': 'x' })).toThrow(/invalid label "bad-label" on metric "m"/);
  });

  it('rejects malformed metric names', () => {
    expect(() => metricKey('bad-name')).toThrow(InvalidMetricNameError);
    expect(() => metricKey('')).toThrow(InvalidMetricNameError);
    expect(metricKey('ns:op_total').name).toBe('ns:op_total');
  });
});
