/**
 * TCP Transport
 *
 * node:net implementation of the Transport interface. libuv sets
 * SO_REUSEADDR on every explicit bind, so sockets bound before connecting
 * can share their port with a listener.
 */

import * as net from 'net';
import Debug from 'debug';
import { getBindAddressFor, formatEndpoint } from '../utils/endpoint';
import { toError } from '../errors';
import type { Endpoint } from '../types';
import type { ConnectOptions, Transport, TransportListener } from './types';

const debug = Debug('holepunch-source:transport');

const DEFAULT_CONNECT_TIMEOUT = 10000;

export class TcpTransport implements Transport<net.Socket> {
  connect(remote: Endpoint, options: ConnectOptions = {}): Promise<net.Socket> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT;

    return new Promise<net.Socket>((resolve, reject) => {
      if (options.signal?.aborted) {
        reject(new Error('Connect aborted'));
        return;
      }

      const connectOptions: net.TcpNetConnectOpts = { host: remote.address, port: remote.port };
      if (options.localEndpoint) {
        connectOptions.localAddress = options.localEndpoint.address;
        connectOptions.localPort = options.localEndpoint.port;
      } else if (options.reuseAddress) {
        connectOptions.localAddress = getBindAddressFor(remote.address);
      }

      const socket = net.connect(connectOptions);
      socket.setTimeout(timeoutMs);

      const cleanup = (): void => {
        socket.off('connect', onConnect);
        socket.off('error', onError);
        socket.off('timeout', onTimeout);
        options.signal?.removeEventListener('abort', onAbort);
      };

      const onConnect = (): void => {
        cleanup();
        socket.setTimeout(0);
        socket.on('error', (err) => {
          debug(`Socket error (${formatEndpoint(remote)}): ${err.message}`);
        });
        resolve(socket);
      };

      const onError = (err: Error): void => {
        cleanup();
        socket.destroy();
        reject(err);
      };

      const onTimeout = (): void => onError(new Error(`Connect to ${formatEndpoint(remote)} timed out`));
      const onAbort = (): void => onError(new Error('Connect aborted'));

      socket.once('connect', onConnect);
      socket.once('error', onError);
      socket.once('timeout', onTimeout);
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  listen(local: Endpoint, onConnection: (socket: net.Socket) => void): Promise<TransportListener> {
    const server = net.createServer((socket) => {
      socket.on('error', (err) => {
        debug(`Inbound socket error: ${err.message}`);
      });
      onConnection(socket);
    });

    return new Promise<TransportListener>((resolve, reject) => {
      const onListenError = (err: Error): void => reject(err);
      server.once('error', onListenError);
      server.listen({ host: local.address, port: local.port, exclusive: false }, () => {
        server.off('error', onListenError);
        server.on('error', (err) => {
          debug(`Server error: ${err.message}`);
        });

        const address = server.address();
        const endpoint =
          address !== null && typeof address === 'object'
            ? { address: address.address, port: address.port }
            : local;
        debug(`Listening on ${formatEndpoint(endpoint)}`);

        resolve({
          endpoint,
          close: () => {
            // Stops accepting; connections already handed out stay open
            server.close((err) => {
              if (err) {
                debug(`Error closing server: ${toError(err).message}`);
              }
            });
          }
        });
      });
    });
  }

  localEndpointOf(socket: net.Socket): Endpoint | undefined {
    if (socket.localAddress === undefined || socket.localPort === undefined) {
      return undefined;
    }
    return { address: socket.localAddress, port: socket.localPort };
  }

  remoteEndpointOf(socket: net.Socket): Endpoint | undefined {
    if (socket.remoteAddress === undefined || socket.remotePort === undefined) {
      return undefined;
    }
    return { address: socket.remoteAddress, port: socket.remotePort };
  }
}
