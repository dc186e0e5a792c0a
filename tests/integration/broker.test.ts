import net from 'net';
import { PassThrough } from 'stream';
import { BridgeServer } from '../../src/bridge-server';
import { rpcCall } from '../../src/client';
import { Dispatcher } from '../../src/dispatcher';
import { ConnectionBroker } from '../../src/forwarder/broker';
import { HostnameSource, TunnelStrategy } from '../../src/forwarder/coredevice';
import { ConnectStrategy } from '../../src/forwarder/types';
import { UsbmuxClient, UsbmuxStrategy } from '../../src/forwarder/usbmux';
import { buildRequest } from '../../src/protocol/framing';
import { TransportError } from '../../src/types';
import { connectWithTimeout } from '../../src/utils/net';
import { FakeDriver, mockHierarchyText } from '../mocks/fake-driver';

const HOST = '127.0.0.1';

const noHostnames: HostnameSource = { lookup: async () => ({ hostnames: [] }) };

// Strategy that always reaches a local port, standing in for a device tunnel
function loopbackStrategy(port: number): ConnectStrategy {
  return {
    name: 'tunnel',
    connect: async (_deviceId, _port, timeoutMs) => ({
      socket: await connectWithTimeout(HOST, port, timeoutMs),
      attempts: [{ strategy: 'tunnel', target: `${HOST}:${port}`, outcome: 'connected', detail: '' }],
    }),
  };
}

async function startEchoServer(): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer(socket => {
    socket.on('error', () => undefined);
    socket.pipe(socket);
  });
  await new Promise<void>(resolve => server.listen(0, HOST, resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('echo server has no TCP address');
  }
  return { server, port: address.port };
}

function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: HOST, port });
    socket.setEncoding('utf-8');
    socket.once('connect', () => resolve(socket));
    socket.once('error', reject);
  });
}

function readUntil(socket: net.Socket, expected: string): Promise<string> {
  return new Promise(resolve => {
    let text = '';
    socket.on('data', (chunk: string) => {
      text += chunk;
      if (text === expected) resolve(text);
    });
  });
}

function waitForClose(socket: net.Socket): Promise<void> {
  return new Promise(resolve => {
    if (socket.destroyed) {
      resolve();
      return;
    }
    socket.once('close', () => resolve());
  });
}

describe('ConnectionBroker', () => {
  let broker: ConnectionBroker | undefined;
  let echo: { server: net.Server; port: number } | undefined;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await broker?.stop();
    broker = undefined;
    const server = echo?.server;
    echo = undefined;
    if (server) {
      await new Promise(resolve => server.close(resolve));
    }
    jest.restoreAllMocks();
  });

  it('should relay bytes both ways through the first strategy that connects', async () => {
    echo = await startEchoServer();
    broker = new ConnectionBroker({
      deviceId: 'dev',
      host: HOST,
      port: 0,
      devicePort: echo.port,
      connectTimeoutMs: 500,
      strategies: [loopbackStrategy(echo.port)],
    });
    const { port } = await broker.start();

    const client = await connect(port);
    const echoed = readUntil(client, 'ping\npong\n');
    client.write('ping\n');
    client.write('pong\n');

    await expect(echoed).resolves.toBe('ping\npong\n');
    expect(logSpy).toHaveBeenCalledWith(`[forward] connected via tunnel(${HOST}:${echo.port}): connected`);

    const closed = waitForClose(client);
    client.end();
    await closed;
  });

  it('should carry RPC traffic to a bridge listener', async () => {
    const bridge = new BridgeServer(new Dispatcher(new FakeDriver(), { focusDelayMs: 0, launchSettleMs: 0 }), {
      host: HOST,
      port: 0,
    });
    const bridgePort = (await bridge.start()).port;

    try {
      broker = new ConnectionBroker({
        deviceId: 'dev',
        host: HOST,
        port: 0,
        devicePort: bridgePort,
        connectTimeoutMs: 500,
        strategies: [loopbackStrategy(bridgePort)],
      });
      const { port } = await broker.start();

      const response = await rpcCall(HOST, port, buildRequest(3, 'get_tree'));

      expect(response).toEqual({ id: 3, result: { tree: mockHierarchyText } });
    } finally {
      await broker?.stop();
      await bridge.stop();
    }
  });

  it('should skip strategies that fail and use the next one', async () => {
    echo = await startEchoServer();
    const failing: ConnectStrategy = {
      name: 'tunnel',
      connect: async () => ({
        attempts: [{ strategy: 'tunnel', target: 'dev.coredevice.local', outcome: 'connect-failed', detail: 'refused' }],
      }),
    };
    const working = { ...loopbackStrategy(echo.port), name: 'usbmux' };
    broker = new ConnectionBroker({
      deviceId: 'dev',
      host: HOST,
      port: 0,
      devicePort: echo.port,
      connectTimeoutMs: 500,
      strategies: [failing, working],
    });

    const remote = await broker.resolveRemote();
    remote.destroy();

    expect(logSpy).toHaveBeenCalledWith(
      `[forward] connected via tunnel(dev.coredevice.local): connect-failed (refused); tunnel(${HOST}:${echo.port}): connected`
    );
  });

  it('should close the local connection and name every strategy when none connects', async () => {
    const timeoutMs = 100;
    const slowConnector = (host: string, port: number, ms: number) =>
      new Promise<never>((_resolve, reject) =>
        setTimeout(() => reject(new TransportError(`connect to ${host}:${port} failed: timed out after ${ms}ms`)), ms)
      );
    broker = new ConnectionBroker({
      deviceId: 'dev',
      host: HOST,
      port: 0,
      devicePort: 45678,
      connectTimeoutMs: timeoutMs,
      strategies: [
        new TunnelStrategy(noHostnames, slowConnector),
        new UsbmuxStrategy(new UsbmuxClient('/nonexistent/usbmuxd')),
      ],
    });
    const { port } = await broker.start();

    const started = Date.now();
    const client = await connect(port);
    client.on('error', () => undefined);
    client.resume();
    await waitForClose(client);

    expect(Date.now() - started).toBeLessThan(timeoutMs + 900);
    expect(logSpy).toHaveBeenCalledWith(
      '[forward] drop: TRANSPORT_ERROR: unable to connect to dev:45678 (' +
        'tunnel(dev.coredevice.local): connect-failed (connect to dev.coredevice.local:45678 failed: timed out after 100ms); ' +
        'usbmux: unavailable (no usbmuxd socket at /nonexistent/usbmuxd))'
    );
  });

  it('should drop non-loopback peers without resolving a target', () => {
    const connectSpy = jest.fn();
    broker = new ConnectionBroker({
      deviceId: 'dev',
      host: HOST,
      port: 0,
      connectTimeoutMs: 100,
      strategies: [{ name: 'tunnel', connect: connectSpy }],
    });
    const socket = Object.assign(new PassThrough(), { remoteAddress: '192.168.1.20' });
    const write = jest.spyOn(socket, 'write');

    broker.handleConnection(socket);

    expect(socket.destroyed).toBe(true);
    expect(write).not.toHaveBeenCalled();
    expect(connectSpy).not.toHaveBeenCalled();
    expect(broker.activePairs).toBe(0);
  });

  it('should tear down live pairs on stop', async () => {
    echo = await startEchoServer();
    broker = new ConnectionBroker({
      deviceId: 'dev',
      host: HOST,
      port: 0,
      devicePort: echo.port,
      connectTimeoutMs: 500,
      strategies: [loopbackStrategy(echo.port)],
    });
    const { port } = await broker.start();

    const client = await connect(port);
    client.on('error', () => undefined);
    const echoed = readUntil(client, 'hi\n');
    client.write('hi\n');
    await echoed;
    expect(broker.activePairs).toBe(1);

    const closed = waitForClose(client);
    await broker.stop();
    await closed;

    expect(broker.activePairs).toBe(0);
  });
});
