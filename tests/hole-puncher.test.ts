import { HolePuncher } from '../src/lib/hole-punch/hole-puncher';
import { ConnectionListener } from '../src/lib/hole-punch/connection-listener';
import { ResultSlot } from '../src/lib/hole-punch/result-slot';
import { SourceConnectionAuthenticator } from '../src/lib/hole-punch/authenticator';
import { resolveSourceConfig } from '../src/lib/hole-punch/config';
import { HolePunchStatus } from '../src/lib/hole-punch/types';
import type { ConnectedOutcome, HolePunchConfig, PunchOutcome, PunchVia } from '../src/lib/hole-punch/types';
import { MessageCodec } from '../src/lib/protocol/codec';
import type { Endpoint } from '../src/lib/types';
import { MemoryNetwork, type MemorySocket } from './helpers/memory-network';
import { TEST_TOKEN, WRONG_TOKEN, answerAuthentication, startTarget } from './helpers/peers';
import { delay, waitFor } from './helpers/wait';

const LOCAL: Endpoint = { address: '10.0.0.2', port: 5000 };
const PUBLIC: Endpoint = { address: '203.0.113.10', port: 6000 };
const PRIVATE: Endpoint = { address: '192.168.1.10', port: 6000 };

function expectConnected(outcome: PunchOutcome<MemorySocket>): ConnectedOutcome<MemorySocket> {
  if (outcome.kind !== 'connected') {
    throw new Error(`Expected a connection but the race ended ${outcome.kind}`);
  }
  return outcome;
}

describe('HolePuncher', () => {
  const codec = new MessageCodec();
  let network: MemoryNetwork;
  let slot: ResultSlot<PunchOutcome<MemorySocket>>;
  let holePuncher: HolePuncher<MemorySocket>;
  let authenticator: SourceConnectionAuthenticator;

  function createHolePuncher(overrides: Partial<HolePunchConfig> = {}): HolePuncher<MemorySocket> {
    const config = resolveSourceConfig({
      deadlineMs: 500,
      retryIntervalMs: 20,
      connectTimeoutMs: 100,
      authTimeoutMs: 100,
      ...overrides
    });
    return new HolePuncher(network, new ConnectionListener(network, LOCAL), slot, config);
  }

  beforeEach(() => {
    network = new MemoryNetwork();
    slot = new ResultSlot();
    authenticator = new SourceConnectionAuthenticator(codec, TEST_TOKEN, 100);
    holePuncher = createHolePuncher();
  });

  afterEach(() => {
    holePuncher.shutdownNow();
  });

  describe('Active connections', () => {
    it('returns the first outbound socket that authenticates', async () => {
      await startTarget(network, PRIVATE, codec, TEST_TOKEN);

      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      const outcome = expectConnected(await slot.take());

      expect(outcome.via).toBe('active');
      expect(outcome.remote).toEqual(PRIVATE);
      expect(outcome.socket.destroyed).toBe(false);
      expect(holePuncher.status).toBe(HolePunchStatus.SUCCEEDED);
      expect(network.isListening(LOCAL)).toBe(false);
    });

    it('dials only the two endpoints it was given', async () => {
      holePuncher = createHolePuncher({ deadlineMs: 100 });
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      await slot.take();

      expect(network.dials.length).toBeGreaterThanOrEqual(2);
      expect(network.dials.every((dial) => dial.remote === PUBLIC || dial.remote === PRIVATE)).toBe(true);
      expect(network.dialsTo(PUBLIC)).toBeGreaterThanOrEqual(1);
      expect(network.dialsTo(PRIVATE)).toBeGreaterThanOrEqual(1);
    });

    it('binds outbound attempts to the local endpoint', async () => {
      holePuncher = createHolePuncher({ deadlineMs: 50 });
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      await slot.take();

      expect(network.dials.every((dial) => dial.local === LOCAL)).toBe(true);
    });

    it('dials unbound once the listener holds the local port', async () => {
      network.refuseBindToListeningPort = true;
      await startTarget(network, PRIVATE, codec, TEST_TOKEN);

      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      const outcome = expectConnected(await slot.take());

      expect(outcome.via).toBe('active');
      expect(outcome.remote).toEqual(PRIVATE);
      const toPrivate = network.dials.filter((dial) => dial.remote === PRIVATE);
      expect(toPrivate).toHaveLength(2);
      expect(toPrivate[0].local).toBe(LOCAL);
      expect(toPrivate[1].local).toBeUndefined();
    });

    it('leaves outbound attempts unbound when bindOutbound is off', async () => {
      holePuncher = createHolePuncher({ deadlineMs: 50, bindOutbound: false });
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      await slot.take();

      expect(network.dials.every((dial) => dial.local === undefined)).toBe(true);
    });

    it('waits the retry interval between attempts', async () => {
      holePuncher = createHolePuncher({ deadlineMs: 150, retryIntervalMs: 20 });
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      await slot.take();

      expect(network.dialsTo(PUBLIC)).toBeGreaterThanOrEqual(2);
      expect(network.dialsTo(PUBLIC)).toBeLessThanOrEqual(8);
    });

    it('closes and reports sockets that fail authentication', async () => {
      const target = await startTarget(network, PUBLIC, codec, WRONG_TOKEN);
      const rejected: Array<[PunchVia, Endpoint | undefined]> = [];
      holePuncher = createHolePuncher({ deadlineMs: 120 });
      holePuncher.on('rejected', (via, endpoint) => rejected.push([via, endpoint]));

      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      const outcome = await slot.take();

      expect(outcome.kind).toBe('timed-out');
      expect(target.requests.length).toBeGreaterThanOrEqual(1);
      expect(rejected[0]).toEqual(['active', PUBLIC]);
      expect(network.connections.every((socket) => socket.destroyed)).toBe(true);
    });
  });

  describe('Passive connections', () => {
    it('returns an inbound socket that authenticates', async () => {
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      await waitFor(() => network.isListening(LOCAL));

      const inbound = await network.connect(LOCAL, { localEndpoint: PUBLIC });
      await answerAuthentication(inbound, codec, TEST_TOKEN);
      const outcome = expectConnected(await slot.take());

      expect(outcome.via).toBe('passive');
      expect(outcome.remote).toEqual(PUBLIC);
      expect(outcome.socket.peer).toBe(inbound);
      expect(network.isListening(LOCAL)).toBe(false);
    });

    it('closes inbound sockets that fail authentication', async () => {
      const rejected: Array<[PunchVia, Endpoint | undefined]> = [];
      holePuncher.on('rejected', (via, endpoint) => rejected.push([via, endpoint]));
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      await waitFor(() => network.isListening(LOCAL));

      const inbound = await network.connect(LOCAL, { localEndpoint: PRIVATE });
      await answerAuthentication(inbound, codec, WRONG_TOKEN);
      await waitFor(() => inbound.destroyed);

      expect(rejected).toContainEqual(['passive', PRIVATE]);
      expect(slot.isFilled).toBe(false);
    });

    it('keeps racing when the listener cannot bind', async () => {
      await network.listen(LOCAL, (socket) => socket.destroy());
      await startTarget(network, PUBLIC, codec, TEST_TOKEN);

      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      const outcome = expectConnected(await slot.take());

      expect(outcome.via).toBe('active');
      expect(outcome.remote).toEqual(PUBLIC);
    });
  });

  describe('Deadline and shutdown', () => {
    it('offers a timed-out outcome at the deadline', async () => {
      holePuncher = createHolePuncher({ deadlineMs: 60 });
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);

      await expect(slot.take()).resolves.toEqual({ kind: 'timed-out' });
      expect(holePuncher.status).toBe(HolePunchStatus.FAILED);
      expect(holePuncher.attemptCount).toBeGreaterThanOrEqual(2);
      expect(network.isListening(LOCAL)).toBe(false);
    });

    it('offers a cancelled outcome when shut down mid-race', async () => {
      const statuses: HolePunchStatus[] = [];
      holePuncher.on('status', (status) => statuses.push(status));
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);

      holePuncher.shutdownNow();
      holePuncher.shutdownNow();

      await expect(slot.take()).resolves.toEqual({ kind: 'cancelled' });
      expect(statuses).toEqual([HolePunchStatus.RACING, HolePunchStatus.FAILED]);
    });

    it('emits nothing more when shut down after a winner', async () => {
      await startTarget(network, PRIVATE, codec, TEST_TOKEN);
      const events: string[] = [];
      holePuncher.on('status', (status) => events.push(status));
      holePuncher.on('connected', () => events.push('connected'));

      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      const outcome = expectConnected(await slot.take());
      holePuncher.shutdownNow();
      holePuncher.shutdownNow();
      await delay(30);

      expect(events).toEqual([HolePunchStatus.RACING, HolePunchStatus.SUCCEEDED, 'connected']);
      expect(outcome.socket.destroyed).toBe(false);
    });

    it('keeps a single winner when both endpoints answer', async () => {
      await startTarget(network, PUBLIC, codec, TEST_TOKEN);
      await startTarget(network, PRIVATE, codec, TEST_TOKEN);

      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);
      const outcome = expectConnected(await slot.take());
      await delay(30);

      const live = network.connections.filter((socket) => !socket.destroyed);
      expect(live).toHaveLength(1);
      expect(live[0]).toBe(outcome.socket);
    });

    it('cannot be started twice', () => {
      holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator);

      expect(() => holePuncher.establishHolePunchingConnection(PUBLIC, PRIVATE, authenticator)).toThrow(
        'Hole puncher already started'
      );
    });
  });
});
