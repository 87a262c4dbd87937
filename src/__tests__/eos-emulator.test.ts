import { describe, it, beforeEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { EosEmulator } from '../emulators/eos-emulator';
import { TransportError } from '../errors';

describe('EosEmulator', () => {
  let emu: EosEmulator;

  beforeEach(async () => {
    emu = new EosEmulator({ version: '3.2.0' });
    await emu.open();
  });

  it('should refuse to send before open', () => {
    const closed = new EosEmulator();
    assert.throws(() => closed.send('/eos/ping'), TransportError);
  });

  it('should echo pings', async () => {
    emu.send('/eos/ping', ['abc']);
    assert.deepEqual(await emu.receive(0), [{ address: '/eos/out/ping', args: ['abc'] }]);
  });

  it('should answer the version query', async () => {
    emu.send('/eos/get/version');
    assert.deepEqual(await emu.receive(0), [{ address: '/eos/out/get/version', args: ['3.2.0'] }]);
  });

  it('should answer a cue query with four messages', async () => {
    emu.addCue({ cuelist: 1, cue: 5, part: 0, label: 'Five' });
    emu.addCue({ cuelist: 1, cue: 10, part: 0, label: 'Ten', fx: ['3'] });
    emu.send('/eos/get/cue/1/10/0');

    const batch = await emu.receive(0);
    assert.deepEqual(batch.map((m) => m.address), [
      '/eos/out/get/cue/1/10/0/list/1/2',
      '/eos/out/get/cue/1/10/0/fx/list/1/2',
      '/eos/out/get/cue/1/10/0/links/list/1/2',
      '/eos/out/get/cue/1/10/0/actions/list/1/2',
    ]);
    assert.equal(batch[0].args.length, 31);
    assert.equal(batch[0].args[0], 1);
    assert.equal(batch[0].args[2], 'Ten');
    assert.deepEqual(batch[1].args.slice(2), ['3']);
  });

  it('should stay silent for a missing target', async () => {
    emu.send('/eos/get/cue/1/99/0');
    emu.send('/eos/get/group/4');
    emu.send('/eos/get/macro/4');
    assert.deepEqual(await emu.receive(0), []);
  });

  it('should count targets', async () => {
    emu.addCue({ cuelist: 1, cue: 1, part: 0 });
    emu.addCue({ cuelist: 2, cue: 1, part: 0 });
    emu.addCue({ cuelist: 2, cue: 2, part: 0 });
    emu.addGroup(1, 'All', ['1-10']);

    emu.send('/eos/get/cue/2/count');
    emu.send('/eos/get/cuelist/count');
    emu.send('/eos/get/group/count');
    emu.send('/eos/get/sub/count');

    assert.deepEqual(await emu.receive(0), [
      { address: '/eos/out/get/cue/2/count', args: [2] },
      { address: '/eos/out/get/cuelist/count', args: [2] },
      { address: '/eos/out/get/group/count', args: [1] },
      { address: '/eos/out/get/sub/count', args: [0] },
    ]);
  });

  it('should find cues by index and uid', async () => {
    emu.addCue({ cuelist: 1, cue: 20, part: 0 });
    const first = emu.addCue({ cuelist: 1, cue: 3, part: 0 });

    emu.send('/eos/get/cue/1/index/0');
    const byIndex = await emu.receive(0);
    assert.equal(byIndex[0].address, '/eos/out/get/cue/1/3/0/list/0/2');

    emu.send(`/eos/get/cue/uid/${first.uid}`);
    const byUid = await emu.receive(0);
    assert.equal(byUid.length, 4);
    assert.equal(byUid[0].args[1], first.uid);
  });

  it('should apply cue commands', () => {
    emu.send('/eos/newcmd', ['Cue 1 / 7 # #']);
    emu.send('/eos/newcmd', ['Cue 1 / 7 Block #']);
    emu.send('/eos/newcmd', ['Cue 1 / 7 Intensity Block #']);
    emu.send('/eos/newcmd', ['Cue 1 / 7 Assert #']);
    emu.send('/eos/newcmd', ['Cue 1 / 7 Time 2.5 #']);
    emu.send('/eos/newcmd', ['Cue 1 / 7 Scene Act 2 #']);

    const cue = emu.cue({ cuelist: 1, cue: 7, part: 0 });
    assert.ok(cue);
    assert.equal(cue.block, 'BI');
    assert.equal(cue.assert, 'A');
    assert.equal(cue.upTime, 2.5);
    assert.equal(cue.scene, 'Act 2');
    assert.equal(emu.getCommands().length, 6);
  });

  it('should apply group commands', () => {
    emu.send('/eos/newcmd', ['Group 4 #']);
    emu.send('/eos/newcmd', ['Group 4 Label Sides #']);
    emu.send('/eos/newcmd', ['Chan 1 Thru 5 + 7 Record Group 4 #']);

    const group = emu.group(4);
    assert.ok(group);
    assert.equal(group.label, 'Sides');
    assert.deepEqual(group.channels, ['1-5', '7']);
  });

  it('should record a macro from the key sequence', () => {
    emu.send('/eos/newcmd', ['8 #']);
    emu.send('/eos/key/softkey_6');
    emu.send('/eos/key/Go_To_Cue');
    emu.send('/eos/key/1');
    emu.send('/eos/key/Enter');
    emu.send('/eos/key/Select');

    assert.deepEqual(emu.macro(8)?.command, ['Go_To_Cue', '1', 'Enter']);
    assert.deepEqual(emu.getKeys().map((k) => k.key), ['softkey_6', 'Go_To_Cue', '1', 'Enter', 'Select']);
  });

  it('should log key arguments', () => {
    emu.send('/eos/key/Tab', [{ type: 'f', value: 1 }]);
    assert.deepEqual(emu.getKeys(), [{ key: 'Tab', args: [1] }]);
  });

  it('should drop replies matching a pattern until restored', async () => {
    emu.addGroup(2, 'Specials', ['21']);
    emu.dropReplies('/eos/out/get/group/2/channels*');
    emu.send('/eos/get/group/2');
    assert.deepEqual((await emu.receive(0)).map((m) => m.address), ['/eos/out/get/group/2/list/0/1']);

    emu.restoreReplies();
    emu.send('/eos/get/group/2');
    assert.equal((await emu.receive(0)).length, 2);
  });

  it('should queue pushed notifications', async () => {
    emu.push('/eos/out/active/cue/text', ['1/10 0 50%']);
    assert.deepEqual(await emu.receive(0), [{ address: '/eos/out/active/cue/text', args: ['1/10 0 50%'] }]);
  });

  it('should emit connection events', () => {
    const events: string[] = [];
    emu.on('disconnected', () => events.push('disconnected'));
    emu.close();
    emu.close();
    assert.deepEqual(events, ['disconnected']);
    assert.equal(emu.isConnected(), false);
  });

  it('should load a demo show', () => {
    const demo = new EosEmulator({ demo: true });
    assert.equal(demo.group(1)?.label, 'Front wash');
    assert.equal(demo.cue({ cuelist: 1, cue: 10, part: 0 })?.label, 'Act 1');
    assert.deepEqual(demo.macro(1)?.command, ['Go_To_Cue', '1', 'Enter']);
  });
});
