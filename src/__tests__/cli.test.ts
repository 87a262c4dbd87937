import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { formatCue, formatGroup, formatMacro, formatStateField, parseCliArgs } from '../index';
import { blankCueFields } from '../emulators/eos-emulator';
import { initialSnapshot } from '../eos/console-state';

describe('parseCliArgs', () => {
  it('should parse options and a cue command', () => {
    const options = parseCliArgs(['-v', '--emulate', 'cue', '1/10/2']);
    assert.equal(options.verbose, true);
    assert.equal(options.emulate, true);
    assert.equal(options.help, false);
    assert.deepEqual(options.command, { kind: 'cue', cue: { cuelist: 1, cue: 10, part: 2 } });
  });

  it('should parse the config path', () => {
    assert.equal(parseCliArgs(['--config', 'show.yml', 'version']).configPath, 'show.yml');
  });

  it('should apply command defaults', () => {
    assert.deepEqual(parseCliArgs(['ping']).command, { kind: 'ping', token: 'eos-osc' });
    assert.deepEqual(parseCliArgs(['count', 'group']).command, { kind: 'count', target: 'group', cuelist: 1 });
    assert.deepEqual(parseCliArgs(['watch']).command, { kind: 'watch', seconds: 0 });
  });

  it('should take the cue list for cue counts', () => {
    assert.deepEqual(parseCliArgs(['count', 'cue', '2']).command, { kind: 'count', target: 'cue', cuelist: 2 });
  });

  it('should leave the command empty without words', () => {
    assert.equal(parseCliArgs([]).command, null);
  });

  it('should reject bad input', () => {
    assert.throws(() => parseCliArgs(['-c']), { message: '--config requires a file path' });
    assert.throws(() => parseCliArgs(['--bogus']), { message: 'Unknown option --bogus' });
    assert.throws(() => parseCliArgs(['count', 'lamps']), /^Error: count needs a target/);
    assert.throws(() => parseCliArgs(['group', 'x']), { message: 'Group must be a number, got "x"' });
    assert.throws(() => parseCliArgs(['frobnicate']), { message: 'Unknown command "frobnicate"' });
  });
});

describe('formatters', () => {
  it('should format a cue', () => {
    const cue = { ...blankCueFields('uid-1'), cuelist: 1, cue: 10, part: 0, label: 'Act 1', fx: ['1'] };
    assert.deepEqual(formatCue(cue), [
      'Cue 1 / 10  "Act 1"',
      '  uid      uid-1',
      '  up       5s (delay 0s)',
      '  down     5s (delay 0s)',
      '  fx       1',
    ]);
  });

  it('should format a group', () => {
    assert.deepEqual(formatGroup({ number: 2, uid: 'uid-2', label: 'Specials', channels: ['21', '25-27'] }), [
      'Group 2  "Specials"',
      '  channels 21, 25-27',
    ]);
  });

  it('should format an empty macro', () => {
    assert.deepEqual(formatMacro({ number: 1, uid: 'uid-3', label: '', mode: 'Background', command: [] }), [
      'Macro 1 [Background]',
      '  (empty)',
    ]);
  });

  it('should format state fields', () => {
    const snapshot = { ...initialSnapshot(), activeCue: { cuelist: 1, cue: 10, part: 0, percentage: 0.5 } };
    assert.equal(formatStateField(snapshot, 'activeCue'), '1 / 10 part 0 50%');
    assert.equal(formatStateField(snapshot, 'pendingCue'), '-');
    assert.equal(formatStateField(snapshot, 'locked'), 'false');
    assert.equal(formatStateField(snapshot, 'user'), '-');
  });
});
