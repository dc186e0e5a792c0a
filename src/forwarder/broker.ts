import net, { AddressInfo } from 'net';
import { Duplex } from 'stream';
import { TransportError } from '../types';
import { formatErrorForLog } from '../utils/error';
import { ConnectionSocket, isLoopbackAddress, listen } from '../utils/net';
import { TunnelStrategy } from './coredevice';
import { relay } from './relay';
import { ConnectStrategy, describeAttempt, StrategyAttempt } from './types';
import { UsbmuxStrategy } from './usbmux';

export interface BrokerOptions {
  deviceId: string;
  host: string;
  port: number;
  // Port of the bridge listener on the device, usually the same as `port`
  devicePort?: number;
  connectTimeoutMs: number;
  strategies?: ConnectStrategy[];
}

export function defaultStrategies(): ConnectStrategy[] {
  return [new TunnelStrategy(), new UsbmuxStrategy()];
}

/**
 * Loopback listener that pairs every local connection with a fresh socket to
 * the device's bridge listener and relays bytes between them.
 */
export class ConnectionBroker {
  private server: net.Server | null = null;
  private readonly controller = new AbortController();
  private readonly pairs = new Set<Promise<void>>();
  private readonly strategies: ConnectStrategy[];

  constructor(private readonly options: BrokerOptions) {
    this.strategies = options.strategies ?? defaultStrategies();
  }

  get activePairs(): number {
    return this.pairs.size;
  }

  async start(): Promise<AddressInfo> {
    const server = net.createServer({ allowHalfOpen: true, pauseOnConnect: true }, socket => {
      this.handleConnection(socket);
    });
    this.server = server;
    const address = await listen(server, this.options.port, this.options.host);
    server.on('error', error => {
      console.error(`[forward] listener error: ${formatErrorForLog(error)}`);
    });
    return address;
  }

  async stop(): Promise<void> {
    this.controller.abort();
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
    await Promise.all(this.pairs);
  }

  handleConnection(socket: ConnectionSocket): void {
    if (!isLoopbackAddress(socket.remoteAddress) || this.controller.signal.aborted) {
      socket.destroy();
      return;
    }

    const pair = this.pairConnection(socket).catch(error => {
      console.error(`[forward] drop: ${formatErrorForLog(error)}`);
      socket.destroy();
    });
    this.pairs.add(pair);
    void pair.finally(() => this.pairs.delete(pair));
  }

  private async pairConnection(local: ConnectionSocket): Promise<void> {
    // Without a listener the local socket would never report its own close
    local.on('error', error => {
      console.error(`[forward] local socket error: ${error.message}`);
    });

    const remote = await this.resolveRemote();
    if (local.destroyed || this.controller.signal.aborted) {
      remote.destroy();
      local.destroy();
      return;
    }
    await relay(local, remote, this.controller.signal);
  }

  // Strategies run in order; the first one that yields a socket wins.
  async resolveRemote(): Promise<Duplex> {
    const { deviceId, connectTimeoutMs } = this.options;
    const devicePort = this.options.devicePort ?? this.options.port;
    const attempts: StrategyAttempt[] = [];

    for (const strategy of this.strategies) {
      const result = await strategy.connect(deviceId, devicePort, connectTimeoutMs);
      attempts.push(
        ...(result.attempts.length > 0
          ? result.attempts
          : [{ strategy: strategy.name, outcome: 'unavailable' as const, detail: 'no candidates' }])
      );
      if (result.socket) {
        console.error(`[forward] connected via ${attempts.map(describeAttempt).join('; ')}`);
        return result.socket;
      }
    }

    throw new TransportError(
      `unable to connect to ${deviceId}:${devicePort} (${attempts.map(describeAttempt).join('; ')})`,
      { deviceId, port: devicePort, attempts }
    );
  }
}
