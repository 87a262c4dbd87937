import { describe, it, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as net from 'net';
import { TcpTransport } from '../transport/tcp-transport';
import { FramingStrategy, packetLengthFraming, slipFraming } from '../transport/framing';
import { decodePacket, encodeMessage } from '../transport/packet';
import { TransportError } from '../errors';
import { OscMessage } from '../osc/types';

interface FakeConsole {
  server: net.Server;
  port: number;
  sockets: net.Socket[];
  received: OscMessage[];
  /** Resolves once `count` messages have arrived */
  waitFor(count: number): Promise<OscMessage[]>;
  /** Resolves once the client's socket is accepted */
  waitForConnection(): Promise<net.Socket>;
}

function startFakeConsole(framing: FramingStrategy): Promise<FakeConsole> {
  const sockets: net.Socket[] = [];
  const received: OscMessage[] = [];
  const waiters: Array<{ count: number; resolve: (m: OscMessage[]) => void }> = [];
  const connectionWaiters: Array<(sock: net.Socket) => void> = [];

  const server = net.createServer((sock) => {
    sockets.push(sock);
    for (const w of connectionWaiters.splice(0)) w(sock);
    const decoder = framing.createDecoder();
    sock.on('data', (chunk) => {
      for (const frame of decoder.feed(chunk)) {
        received.push(...decodePacket(frame));
      }
      for (const w of [...waiters]) {
        if (received.length >= w.count) {
          waiters.splice(waiters.indexOf(w), 1);
          w.resolve(received.slice());
        }
      }
    });
  });

  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;
      resolve({
        server,
        port,
        sockets,
        received,
        waitFor(count) {
          if (received.length >= count) return Promise.resolve(received.slice());
          return new Promise((res) => waiters.push({ count, resolve: res }));
        },
        waitForConnection() {
          if (sockets.length > 0) return Promise.resolve(sockets[0]);
          return new Promise((res) => connectionWaiters.push(res));
        },
      });
    });
  });
}

function stopFakeConsole(fake: FakeConsole): Promise<void> {
  for (const sock of fake.sockets) sock.destroy();
  return new Promise((resolve) => fake.server.close(() => resolve()));
}

describe('TcpTransport', () => {
  let transport: TcpTransport | null = null;
  let fake: FakeConsole | null = null;

  afterEach(async () => {
    if (transport) {
      transport.close();
      transport = null;
    }
    if (fake) {
      await stopFakeConsole(fake);
      fake = null;
    }
  });

  it('should describe its endpoint', () => {
    transport = new TcpTransport({ host: '10.0.0.5', port: 3032, framing: slipFraming });
    assert.equal(transport.description, 'tcp-slip 10.0.0.5:3032');
    assert.equal(transport.isConnected(), false);
  });

  it('should send SLIP-framed OSC once open', async () => {
    fake = await startFakeConsole(slipFraming);
    transport = new TcpTransport({ host: '127.0.0.1', port: fake.port, framing: slipFraming });

    await transport.open();
    assert.equal(transport.isConnected(), true);
    transport.send('/eos/ping', ['hello']);

    const received = await fake.waitFor(1);
    assert.deepEqual(received, [{ address: '/eos/ping', args: ['hello'] }]);
  });

  it('should deliver packet-length framed replies through receive()', async () => {
    fake = await startFakeConsole(packetLengthFraming);
    transport = new TcpTransport({ host: '127.0.0.1', port: fake.port, framing: packetLengthFraming });
    await transport.open();
    await fake.waitForConnection();

    fake.sockets[0].write(packetLengthFraming.encode(encodeMessage('/eos/out/get/version', ['3.2.10'])));

    const batch = await transport.receive(2000);
    assert.deepEqual(batch, [{ address: '/eos/out/get/version', args: ['3.2.10'] }]);
  });

  it('should replay messages sent before the connection opened', async () => {
    fake = await startFakeConsole(slipFraming);
    transport = new TcpTransport({ host: '127.0.0.1', port: fake.port, framing: slipFraming });

    transport.send('/eos/key/Blind');
    transport.send('/eos/newcmd', ['Cue 1 / 5 # #']);
    await transport.open();

    const received = await fake.waitFor(2);
    assert.deepEqual(received.map((m) => m.address), ['/eos/key/Blind', '/eos/newcmd']);
    assert.deepEqual(received[1].args, ['Cue 1 / 5 # #']);
  });

  it('should emit disconnected when the console drops the connection', async () => {
    fake = await startFakeConsole(slipFraming);
    transport = new TcpTransport({ host: '127.0.0.1', port: fake.port, framing: slipFraming, reconnectDelayMs: 60000 });
    await transport.open();
    await fake.waitForConnection();

    const disconnected = new Promise<void>((resolve) => transport?.once('disconnected', () => resolve()));
    fake.sockets[0].destroy();
    await disconnected;
    assert.equal(transport.isConnected(), false);
  });

  it('should reject open() with a TransportError when nothing listens', async () => {
    const placeholder = await startFakeConsole(slipFraming);
    const port = placeholder.port;
    await stopFakeConsole(placeholder);

    transport = new TcpTransport({ host: '127.0.0.1', port, framing: slipFraming });
    await assert.rejects(transport.open(), TransportError);
    assert.equal(transport.isConnected(), false);
  });
});
