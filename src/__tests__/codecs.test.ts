import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { z } from 'zod';
import {
  PositionalSchema,
  channelSelection,
  commandText,
  cueSchema,
  decodeCueFields,
  decodeListTail,
  groupSchema,
  macroSchema,
  parseCueReplyAddress,
  replySection,
} from '../eos/codecs';
import { CommandRejectedError, DecodeError } from '../errors';
import { OscValue } from '../osc/types';

/** Cue reply arguments for a cue with label "Act 1", 3s up / 5s down */
function cueReplyArgs(): OscValue[] {
  return [
    4, 'uid-cue-10', 'Act 1',
    3, 0, 5, 0,
    -1, 0, -1, 0, -1, 0,
    false, 0, 100,
    'M', 'B', '', 12,
    -1, -1, true, 0, 0,
    '', 1, 'Top of show', 'Opening', false, -1,
  ];
}

describe('PositionalSchema', () => {
  const pair = new PositionalSchema('pair', { left: z.number(), right: z.string() });

  it('should name fields in order', () => {
    assert.deepEqual(pair.fields, ['left', 'right']);
    assert.equal(pair.fieldCount, 2);
  });

  it('should decode an argument list by position', () => {
    assert.deepEqual(pair.decode([1, 'a']), { left: 1, right: 'a' });
  });

  it('should reject a wrong argument count', () => {
    assert.throws(() => pair.decode([1]), {
      name: 'DecodeError',
      message: 'pair reply has 1 argument(s), expected 2',
    });
    assert.throws(() => pair.decode([1, 'a', 'b']), DecodeError);
  });

  it('should name the field with the wrong type', () => {
    assert.throws(() => pair.decode(['1', 'a']), /pair field "left"/);
  });
});

describe('cue codec', () => {
  it('should have 31 fields', () => {
    assert.equal(cueSchema.fieldCount, 31);
  });

  it('should decode every positional field', () => {
    const fields = decodeCueFields(cueReplyArgs());
    assert.equal(fields.index, 4);
    assert.equal(fields.uid, 'uid-cue-10');
    assert.equal(fields.label, 'Act 1');
    assert.equal(fields.upTime, 3);
    assert.equal(fields.downTime, 5);
    assert.equal(fields.preheat, false);
    assert.equal(fields.rate, 100);
    assert.equal(fields.mark, 'M');
    assert.equal(fields.block, 'B');
    assert.equal(fields.assert, '');
    assert.equal(fields.allFade, true);
    assert.equal(fields.solo, false);
    assert.equal(fields.partCount, 1);
    assert.equal(fields.notes, 'Top of show');
    assert.equal(fields.scene, 'Opening');
    assert.equal(fields.sceneEnd, false);
    assert.equal(fields.cuePartIndex, -1);
  });

  it('should accept a numeric link target as text', () => {
    assert.equal(decodeCueFields(cueReplyArgs()).link, '12');
  });

  it('should reject a short reply', () => {
    assert.throws(() => decodeCueFields(cueReplyArgs().slice(0, 30)), /cue reply has 30 argument\(s\), expected 31/);
  });

  it('should reject a text value in a time field', () => {
    const args = cueReplyArgs();
    args[3] = 'three';
    assert.throws(() => decodeCueFields(args), /cue field "upTime"/);
  });
});

describe('group and macro codecs', () => {
  it('should decode group properties', () => {
    assert.deepEqual(groupSchema.decode([0, 'uid-g1', 'Front wash']), { index: 0, uid: 'uid-g1', label: 'Front wash' });
  });

  it('should decode macro properties with a numeric mode as text', () => {
    assert.deepEqual(macroSchema.decode([2, 'uid-m5', 'Reset', 1]), {
      index: 2,
      uid: 'uid-m5',
      label: 'Reset',
      mode: '1',
    });
  });
});

describe('decodeListTail', () => {
  it('should split head and items', () => {
    assert.deepEqual(decodeListTail([0, 'uid-g1', '1-5', 7], 'channels'), {
      index: 0,
      uid: 'uid-g1',
      items: ['1-5', '7'],
    });
  });

  it('should allow an empty tail', () => {
    assert.deepEqual(decodeListTail([3, 'uid'], 'fx').items, []);
  });

  it('should require index and uid', () => {
    assert.throws(() => decodeListTail([0], 'channels'), /channels reply has 1 argument\(s\), expected at least 2/);
    assert.throws(() => decodeListTail(['x', 'uid'], 'channels'), /index must be a number/);
  });
});

describe('reply addresses', () => {
  it('should parse a cue property reply', () => {
    assert.deepEqual(parseCueReplyAddress('/eos/out/get/cue/1/10.5/0/list/3/12'), {
      cuelist: 1,
      cue: 10.5,
      part: 0,
      section: 'base',
    });
  });

  it('should recognize the cue sub-records', () => {
    assert.equal(parseCueReplyAddress('/eos/out/get/cue/1/10/0/fx/list/0/1')?.section, 'fx');
    assert.equal(parseCueReplyAddress('/eos/out/get/cue/1/10/0/links/list/0/1')?.section, 'links');
    assert.equal(parseCueReplyAddress('/eos/out/get/cue/1/10/0/actions/list/0/1')?.section, 'actions');
  });

  it('should ignore other replies', () => {
    assert.equal(parseCueReplyAddress('/eos/out/get/cue/1/count'), null);
    assert.equal(parseCueReplyAddress('/eos/out/get/group/1/list/0/1'), null);
  });

  it('should classify group replies and reject a longer number', () => {
    const base = '/eos/out/get/group/5';
    assert.equal(replySection(`${base}/list/0/2`, base, ['channels']), 'base');
    assert.equal(replySection(`${base}/channels/list/0/2`, base, ['channels']), 'channels');
    assert.equal(replySection('/eos/out/get/group/50/list/0/2', base, ['channels']), null);
    assert.equal(replySection(base, base, ['channels']), 'base');
  });
});

describe('command text', () => {
  const cue = { cuelist: 1, cue: 10, part: 0 };
  const part = { cuelist: 1, cue: 10, part: 2 };

  it('should build cue commands', () => {
    assert.equal(commandText.recordBlankCue(cue), 'Cue 1 / 10 # #');
    assert.equal(commandText.intensityBlock(cue), 'Cue 1 / 10 Intensity Block #');
    assert.equal(commandText.block(part), 'Cue 1 / 10 Part 2 Block #');
    assert.equal(commandText.assert(cue), 'Cue 1 / 10 Assert #');
    assert.equal(commandText.time(part, 2.5), 'Cue 1 / 10 Part 2 Time 2.5 #');
    assert.equal(commandText.scene(cue, 'Act 1'), 'Cue 1 / 10 Scene Act 1 #');
  });

  it('should build group and macro commands', () => {
    assert.equal(commandText.selectGroup(5), 'Group 5 #');
    assert.equal(commandText.labelGroup(5, 'Specials'), 'Group 5 Label Specials #');
    assert.equal(
      commandText.recordGroup({ number: 5, channels: ['1-5', '7'] }),
      'Chan 1 Thru 5 + 7 Record Group 5 #',
    );
    assert.equal(commandText.selectMacro(12), '12 #');
  });

  it('should refuse text containing the Enter marker', () => {
    assert.throws(() => commandText.labelGroup(5, 'A # B'), CommandRejectedError);
    assert.throws(() => commandText.scene(cue, '#'), CommandRejectedError);
  });

  it('should render channel selections', () => {
    assert.equal(channelSelection(['1-5', '7']), '1 Thru 5 + 7');
    assert.equal(channelSelection(['12']), '12');
    assert.throws(() => channelSelection([]), CommandRejectedError);
  });
});
