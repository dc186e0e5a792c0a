import net, { AddressInfo } from 'net';
import { Duplex } from 'stream';
import { TransportError } from '../types';

// Anything accepted from a listener: a net.Socket, or a stand-in stream in tests
export type ConnectionSocket = Duplex & { remoteAddress?: string };

const IPV4_MAPPED_PREFIX = '::ffff:';

export function isLoopbackAddress(address: string | undefined): boolean {
  if (!address) {
    return false;
  }

  const lowered = address.toLowerCase();
  const candidate = lowered.startsWith(IPV4_MAPPED_PREFIX)
    ? lowered.slice(IPV4_MAPPED_PREFIX.length)
    : lowered;

  if (net.isIPv4(candidate)) {
    return candidate.split('.')[0] === '127';
  }
  return candidate === '::1' || candidate === '0:0:0:0:0:0:0:1';
}

export function listen(server: net.Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new TransportError(`listener on ${host}:${port} did not report a TCP address`));
        return;
      }
      resolve(address);
    });
  });
}

export function writeAll(socket: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, error => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * Open a TCP connection, failing with TransportError when it does not complete
 * within `timeoutMs`.
 */
export function connectWithTimeout(
  host: string,
  port: number,
  timeoutMs: number
): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ port, host });
    const fail = (reason: string) => {
      socket.removeAllListeners();
      socket.destroy();
      reject(new TransportError(`connect to ${host}:${port} failed: ${reason}`, { host, port }));
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.removeAllListeners();
      socket.setTimeout(0);
      resolve(socket);
    });
    socket.once('timeout', () => fail(`timed out after ${timeoutMs}ms`));
    socket.once('error', error => fail(error.message));
  });
}
