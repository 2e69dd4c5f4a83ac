import * as net from 'net';
import { TcpTransport } from '../src/lib/transport/tcp-transport';
import { HolePunchingSource } from '../src/lib/hole-punch/source';
import { MessageCodec } from '../src/lib/protocol/codec';
import type { TransportListener } from '../src/lib/transport/types';
import type { PunchVia } from '../src/lib/hole-punch/types';
import type { Endpoint } from '../src/lib/types';
import { TEST_TOKEN, answerAuthentication, forwardedEndpoints } from './helpers/peers';

const LOOPBACK = '127.0.0.1';

describe('TcpTransport', () => {
  const transport = new TcpTransport();
  const listeners: TransportListener[] = [];
  const sockets: net.Socket[] = [];

  async function listen(onConnection: (socket: net.Socket) => void = () => undefined): Promise<Endpoint> {
    const listener = await transport.listen({ address: LOOPBACK, port: 0 }, (socket) => {
      sockets.push(socket);
      onConnection(socket);
    });
    listeners.push(listener);
    return listener.endpoint;
  }

  afterEach(() => {
    for (const socket of sockets.splice(0)) socket.destroy();
    for (const listener of listeners.splice(0)) listener.close();
  });

  it('connects to a loopback listener and reports both endpoints', async () => {
    let onAccepted: (socket: net.Socket) => void = () => undefined;
    const accepted = new Promise<net.Socket>((resolve) => {
      onAccepted = resolve;
    });
    const endpoint = await listen((socket) => onAccepted(socket));

    const client = await transport.connect(endpoint);
    sockets.push(client);
    const server = await accepted;

    expect(transport.localEndpointOf(server)).toEqual(endpoint);
    expect(transport.remoteEndpointOf(client)).toEqual(endpoint);
    expect(transport.remoteEndpointOf(server)).toEqual(transport.localEndpointOf(client));
  });

  it('listens on an ephemeral port when asked for port 0', async () => {
    const endpoint = await listen();

    expect(endpoint.address).toBe(LOOPBACK);
    expect(endpoint.port).toBeGreaterThan(0);
  });

  it('rejects when nothing listens on the port', async () => {
    const endpoint = await listen();
    listeners.splice(0).forEach((listener) => listener.close());

    await expect(transport.connect(endpoint)).rejects.toThrow('ECONNREFUSED');
  });

  it('rejects an already aborted connect', async () => {
    const endpoint = await listen();

    await expect(transport.connect(endpoint, { signal: AbortSignal.abort() })).rejects.toThrow('Connect aborted');
  });

  it('binds a reusable wildcard address for control connections', async () => {
    const endpoint = await listen();
    const client = await transport.connect(endpoint, { reuseAddress: true });
    sockets.push(client);

    expect(transport.localEndpointOf(client)?.address).toBe(LOOPBACK);
    expect(transport.localEndpointOf(client)?.port).toBeGreaterThan(0);
  });
});

describe('HolePunchingSource over TCP', () => {
  const codec = new MessageCodec();
  const servers: net.Server[] = [];
  const sockets: net.Socket[] = [];

  function serve(onConnection: (socket: net.Socket) => void): Promise<Endpoint> {
    const server = net.createServer((socket) => {
      sockets.push(socket);
      socket.on('error', () => undefined);
      onConnection(socket);
    });
    servers.push(server);
    return new Promise((resolve) => {
      server.listen(0, LOOPBACK, () => {
        const address = server.address();
        resolve({ address: LOOPBACK, port: address !== null && typeof address === 'object' ? address.port : 0 });
      });
    });
  }

  afterEach(() => {
    for (const socket of sockets.splice(0)) socket.destroy();
    for (const server of servers.splice(0)) server.close();
  });

  it('wins through an outbound dial with the default configuration', async () => {
    const target = await serve((socket) => {
      void answerAuthentication(socket, codec, TEST_TOKEN);
    });
    const unreachable = await serve((socket) => socket.destroy());
    const mediator = await serve((socket) => {
      void codec
        .readMessage(socket)
        .then(() => codec.writeMessage(socket, forwardedEndpoints([target, unreachable], TEST_TOKEN)));
    });
    const winners: PunchVia[] = [];

    const source = new HolePunchingSource({
      codec,
      deadlineMs: 2000,
      onHolePuncher: (hp) => hp.on('connected', (outcome) => winners.push(outcome.via))
    });
    const socket = await source.getSocket('target-1', mediator);
    sockets.push(socket);

    expect(winners).toEqual(['active']);
    expect(socket.destroyed).toBe(false);
    expect(socket.remotePort).toBe(target.port);
  });
});
