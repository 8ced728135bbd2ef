import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { displayName, isRecord, toBool, toFloat, toInt } from '../../src/normalize/fields';

describe('toInt', () => {
  it('truncates numbers and numeric strings', () => {
    assert.equal(toInt(7.9), 7);
    assert.equal(toInt('12'), 12);
    assert.equal(toInt(0), 0);
  });

  it('is undefined for anything non-numeric', () => {
    assert.equal(toInt(null), undefined);
    assert.equal(toInt(undefined), undefined);
    assert.equal(toInt('abc'), undefined);
    assert.equal(toInt(''), undefined);
    assert.equal(toInt(NaN), undefined);
  });
});

describe('toFloat', () => {
  it('maps NaN, infinities and missing values to null', () => {
    assert.equal(toFloat(NaN), null);
    assert.equal(toFloat(Infinity), null);
    assert.equal(toFloat(undefined), null);
    assert.equal(toFloat(null), null);
  });

  it('keeps finite values', () => {
    assert.equal(toFloat(52.1), 52.1);
    assert.equal(toFloat('1.5'), 1.5);
  });
});

describe('toBool', () => {
  it('falls back only for missing values', () => {
    assert.equal(toBool(undefined, false), false);
    assert.equal(toBool(null, true), true);
    assert.equal(toBool(false, true), false);
    assert.equal(toBool({ value: 31, displayName: 'Yellow' }, false), true);
  });
});

describe('displayName', () => {
  it('resolves descriptors and passes plain values through', () => {
    assert.equal(displayName({ value: 1, displayName: 'FirstHalf' }), 'FirstHalf');
    assert.equal(displayName('SecondHalf'), 'SecondHalf');
    assert.equal(displayName(undefined), null);
    assert.equal(displayName({ value: 2 }), null);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    assert.equal(isRecord({}), true);
    assert.equal(isRecord([]), false);
    assert.equal(isRecord(null), false);
  });
});
