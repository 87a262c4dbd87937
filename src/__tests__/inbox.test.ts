import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { Inbox } from '../transport/inbox';

describe('Inbox', () => {
  it('should return buffered messages immediately', async () => {
    const inbox = new Inbox();
    inbox.push({ address: '/a', args: [] });
    inbox.push({ address: '/b', args: [1] });

    const batch = await inbox.take(1000);
    assert.deepEqual(batch.map((m) => m.address), ['/a', '/b']);
    assert.equal(inbox.size, 0);
  });

  it('should resolve with [] at the timeout', async () => {
    const inbox = new Inbox();
    const started = Date.now();
    const batch = await inbox.take(20);
    assert.deepEqual(batch, []);
    assert.ok(Date.now() - started >= 15);
  });

  it('should not wait when the timeout is zero', async () => {
    const inbox = new Inbox();
    assert.deepEqual(await inbox.take(0), []);
  });

  it('should wake a waiting reader on push', async () => {
    const inbox = new Inbox();
    const pending = inbox.take(5000);
    setTimeout(() => inbox.push({ address: '/late', args: ['x'] }), 5);

    const batch = await pending;
    assert.deepEqual(batch, [{ address: '/late', args: ['x'] }]);
  });

  it('should allow only one reader at a time', async () => {
    const inbox = new Inbox();
    const first = inbox.take(50);
    await assert.rejects(inbox.take(50), /pending reader/);
    inbox.push({ address: '/x', args: [] });
    assert.equal((await first).length, 1);
  });

  it('should drop the oldest messages beyond capacity', async () => {
    const inbox = new Inbox(2);
    inbox.push({ address: '/1', args: [] });
    inbox.push({ address: '/2', args: [] });
    inbox.push({ address: '/3', args: [] });

    assert.equal(inbox.droppedCount, 1);
    assert.deepEqual((await inbox.take(0)).map((m) => m.address), ['/2', '/3']);
  });
});
