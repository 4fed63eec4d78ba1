/**
 * 指标权重归一化测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { isNormalized, normalizeWeights } from '../../../src/core/regimeDetector/weights.js';

describe('normalizeWeights', () => {
  it('scales weights to sum to one and preserves order', () => {
    const weights = normalizeWeights({ adx: 3, rsi: 1 });

    assert.deepEqual(weights, { adx: 0.75, rsi: 0.25 });
    assert.equal(isNormalized(weights), true);
  });

  it('splits evenly when every weight is zero', () => {
    assert.deepEqual(normalizeWeights({ a: 0, b: 0, c: 0, d: 0 }), { a: 0.25, b: 0.25, c: 0.25, d: 0.25 });
  });

  it('keeps equal inputs equal', () => {
    const weights = normalizeWeights({ a: 2, b: 2, c: 4 });

    assert.equal(weights['a'], weights['b']);
    assert.equal(weights['c'], 0.5);
  });

  it('returns an empty object for empty input', () => {
    assert.deepEqual(normalizeWeights({}), {});
    assert.equal(isNormalized({}), true);
  });

  it('rejects negative and non-finite weights', () => {
    assert.throws(() => normalizeWeights({ a: 1, b: -1 }), {
      name: 'RangeError',
      message: '权重必须为非负有限数：b=-1',
    });
    assert.throws(() => normalizeWeights({ x: Number.POSITIVE_INFINITY }), {
      message: '权重必须为非负有限数：x=Infinity',
    });
  });

  it('detects weights that do not sum to one', () => {
    assert.equal(isNormalized({ a: 0.5, b: 0.4 }), false);
    assert.equal(isNormalized({ a: 0.5, b: 0.5000000001 }), true);
  });
});
