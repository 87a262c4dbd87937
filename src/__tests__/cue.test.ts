import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import {
  cueFormat,
  cueTarget,
  formatNumber,
  parseCueSpec,
  parseCueText,
  sameCue,
} from '../eos/cue';
import { DecodeError } from '../errors';

describe('formatNumber', () => {
  it('should drop a trailing .0', () => {
    assert.equal(formatNumber(10), '10');
    assert.equal(formatNumber(10.0), '10');
  });

  it('should keep up to three decimals', () => {
    assert.equal(formatNumber(1.5), '1.5');
    assert.equal(formatNumber(2.125), '2.125');
    assert.equal(formatNumber(0.1 + 0.2), '0.3');
  });

  it('should render negative zero as 0', () => {
    assert.equal(formatNumber(-0), '0');
  });

  it('should reject non-finite numbers', () => {
    assert.throws(() => formatNumber(NaN), RangeError);
    assert.throws(() => formatNumber(Infinity), RangeError);
  });
});

describe('cueFormat', () => {
  it('should put spaces around the list separator', () => {
    assert.equal(cueFormat({ cuelist: 1, cue: 10 }), '1 / 10');
    assert.equal(cueFormat({ cuelist: 2, cue: 1.5 }), '2 / 1.5');
  });
});

describe('cueTarget', () => {
  it('should leave out part 0', () => {
    assert.equal(cueTarget({ cuelist: 1, cue: 10, part: 0 }), 'Cue 1 / 10');
  });

  it('should name a non-zero part', () => {
    assert.equal(cueTarget({ cuelist: 1, cue: 10, part: 2 }), 'Cue 1 / 10 Part 2');
  });
});

describe('parseCueText', () => {
  it('should decode list, cue and part', () => {
    assert.deepEqual(parseCueText('1/10 2'), { cuelist: 1, cue: 10, part: 2 });
  });

  it('should decode a progress percentage', () => {
    assert.deepEqual(parseCueText('1/10 2 55%'), { cuelist: 1, cue: 10, part: 2, percentage: 0.55 });
  });

  it('should decode fractional cue numbers', () => {
    assert.deepEqual(parseCueText('3/2.5 0 100%'), { cuelist: 3, cue: 2.5, part: 0, percentage: 1 });
  });

  it('should reject the wrong number of fields', () => {
    assert.throws(() => parseCueText('1/10'), DecodeError);
    assert.throws(() => parseCueText('1/10 2 55% extra'), DecodeError);
    assert.throws(() => parseCueText('1/10  2'), DecodeError);
  });

  it('should reject malformed fields', () => {
    assert.throws(() => parseCueText('10 2'), /must start with/);
    assert.throws(() => parseCueText('1/x 2'), /Invalid cue number "x"/);
    assert.throws(() => parseCueText('1/10 2 55'), /percentage/);
  });
});

describe('parseCueSpec', () => {
  it('should default to list 1 and part 0', () => {
    assert.deepEqual(parseCueSpec('10'), { cuelist: 1, cue: 10, part: 0 });
    assert.deepEqual(parseCueSpec('2/10'), { cuelist: 2, cue: 10, part: 0 });
    assert.deepEqual(parseCueSpec('2/10/3'), { cuelist: 2, cue: 10, part: 3 });
  });

  it('should reject anything else', () => {
    assert.throws(() => parseCueSpec('1/2/3/4'), DecodeError);
    assert.throws(() => parseCueSpec('a/1'), DecodeError);
    assert.throws(() => parseCueSpec('1//2'), DecodeError);
  });
});

describe('sameCue', () => {
  it('should compare identities only', () => {
    assert.equal(sameCue({ cuelist: 1, cue: 2, part: 0, percentage: 0.5 }, { cuelist: 1, cue: 2, part: 0 }), true);
    assert.equal(sameCue({ cuelist: 1, cue: 2, part: 0 }, { cuelist: 1, cue: 2, part: 1 }), false);
    assert.equal(sameCue(null, null), true);
    assert.equal(sameCue(null, { cuelist: 1, cue: 1, part: 0 }), false);
  });
});
