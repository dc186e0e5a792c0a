import fs from 'fs';
import net from 'net';
import * as plist from 'plist';
import { PlistObject } from 'plist';
import { z } from 'zod';
import { TransportError } from '../types';
import { ConnectStrategy, StrategyResult } from './types';

export const DEFAULT_USBMUXD_SOCKET = '/var/run/usbmuxd';

const HEADER_SIZE = 16;
const PROTOCOL_VERSION = 1;
const MESSAGE_PLIST = 8;
const CLIENT_NAME = 'mobile-rpc-bridge';

const DeviceListSchema = z
  .object({
    DeviceList: z.array(
      z
        .object({
          DeviceID: z.number(),
          Properties: z
            .object({
              SerialNumber: z.string().optional(),
              ConnectionType: z.string().optional(),
            })
            .passthrough(),
        })
        .passthrough()
    ),
  })
  .passthrough();

const ResultSchema = z.object({ MessageType: z.literal('Result'), Number: z.number() }).passthrough();

export interface UsbmuxDevice {
  deviceId: number;
  serialNumber: string;
  connectionType?: string;
}

export interface UsbmuxPacket {
  tag: number;
  payload: unknown;
}

// usbmuxd expects the port in network byte order inside a little-endian field
export function swapPortBytes(port: number): number {
  return ((port & 0xff) << 8) | ((port >> 8) & 0xff);
}

export function encodeUsbmuxPacket(payload: PlistObject, tag: number): Buffer {
  const body = Buffer.from(plist.build(payload), 'utf-8');
  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt32LE(HEADER_SIZE + body.length, 0);
  header.writeUInt32LE(PROTOCOL_VERSION, 4);
  header.writeUInt32LE(MESSAGE_PLIST, 8);
  header.writeUInt32LE(tag, 12);
  return Buffer.concat([header, body]);
}

/**
 * Split one packet off the front of `buffer`. Returns undefined until the whole
 * packet has arrived.
 */
export function decodeUsbmuxPacket(buffer: Buffer): { packet: UsbmuxPacket; rest: Buffer } | undefined {
  if (buffer.length < HEADER_SIZE) {
    return undefined;
  }
  const length = buffer.readUInt32LE(0);
  if (length < HEADER_SIZE) {
    throw new TransportError(`usbmuxd sent an invalid packet length ${length}`);
  }
  if (buffer.length < length) {
    return undefined;
  }

  const tag = buffer.readUInt32LE(12);
  const payload: unknown = plist.parse(buffer.subarray(HEADER_SIZE, length).toString('utf-8'));
  return { packet: { tag, payload }, rest: buffer.subarray(length) };
}

export function findUsbmuxDevice(payload: unknown, serial: string): UsbmuxDevice | undefined {
  const parsed = DeviceListSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TransportError('usbmuxd returned an unexpected device list');
  }

  const normalize = (value: string) => value.replace(/-/g, '').toLowerCase();
  const wanted = normalize(serial);
  const match = parsed.data.DeviceList.find(
    entry => normalize(entry.Properties.SerialNumber ?? '') === wanted
  );
  if (!match) {
    return undefined;
  }

  return {
    deviceId: match.DeviceID,
    serialNumber: match.Properties.SerialNumber ?? serial,
    connectionType: match.Properties.ConnectionType,
  };
}

function openSocket(socketPath: string, timeoutMs: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ path: socketPath });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new TransportError(`usbmuxd did not accept a connection within ${timeoutMs}ms`));
    }, timeoutMs);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeAllListeners('error');
      resolve(socket);
    });
    socket.once('error', error => {
      clearTimeout(timer);
      reject(new TransportError(`usbmuxd connection failed: ${error.message}`));
    });
  });
}

// Reads exactly one reply and leaves the socket paused with any extra bytes unshifted.
function readPacket(socket: net.Socket, timeoutMs: number): Promise<UsbmuxPacket> {
  return new Promise((resolve, reject) => {
    let buffer = Buffer.alloc(0);

    const cleanup = () => {
      clearTimeout(timer);
      socket.off('data', onData);
      socket.off('error', onError);
      socket.off('close', onClose);
      socket.pause();
    };
    const onError = (error: Error) => {
      cleanup();
      reject(new TransportError(`usbmuxd connection failed: ${error.message}`));
    };
    const onClose = () => {
      cleanup();
      reject(new TransportError('usbmuxd closed the connection'));
    };
    const onData = (chunk: Buffer) => {
      buffer = Buffer.concat([buffer, chunk]);
      try {
        const decoded = decodeUsbmuxPacket(buffer);
        if (!decoded) return;
        cleanup();
        if (decoded.rest.length > 0) {
          socket.unshift(decoded.rest);
        }
        resolve(decoded.packet);
      } catch (error) {
        cleanup();
        reject(error);
      }
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TransportError(`usbmuxd did not reply within ${timeoutMs}ms`));
    }, timeoutMs);

    socket.on('data', onData);
    socket.once('error', onError);
    socket.once('close', onClose);
  });
}

/**
 * Minimal usbmuxd client: device lookup by serial number and a raw TCP channel
 * to a port on that device.
 */
export class UsbmuxClient {
  private nextTag = 1;

  constructor(readonly socketPath: string = process.env.USBMUXD_SOCKET_ADDRESS || DEFAULT_USBMUXD_SOCKET) {}

  isAvailable(): boolean {
    return fs.existsSync(this.socketPath);
  }

  private message(messageType: string, extra: PlistObject = {}): PlistObject {
    return {
      MessageType: messageType,
      ClientVersionString: CLIENT_NAME,
      ProgName: CLIENT_NAME,
      kLibUSBMuxVersion: 3,
      ...extra,
    };
  }

  async findDevice(serial: string, timeoutMs: number): Promise<UsbmuxDevice | undefined> {
    const socket = await openSocket(this.socketPath, timeoutMs);
    try {
      socket.write(encodeUsbmuxPacket(this.message('ListDevices'), this.nextTag++));
      const reply = await readPacket(socket, timeoutMs);
      return findUsbmuxDevice(reply.payload, serial);
    } finally {
      socket.destroy();
    }
  }

  async connect(device: UsbmuxDevice, port: number, timeoutMs: number): Promise<net.Socket> {
    const socket = await openSocket(this.socketPath, timeoutMs);
    try {
      socket.write(
        encodeUsbmuxPacket(
          this.message('Connect', { DeviceID: device.deviceId, PortNumber: swapPortBytes(port) }),
          this.nextTag++
        )
      );
      const reply = await readPacket(socket, timeoutMs);
      const result = ResultSchema.safeParse(reply.payload);
      if (!result.success) {
        throw new TransportError('usbmuxd returned an unexpected reply to Connect');
      }
      if (result.data.Number !== 0) {
        throw new TransportError(`usbmuxd refused the connection (result ${result.data.Number})`);
      }
      return socket;
    } catch (error) {
      socket.destroy();
      throw error;
    }
  }
}

export class UsbmuxStrategy implements ConnectStrategy {
  readonly name = 'usbmux';

  constructor(private readonly client: UsbmuxClient = new UsbmuxClient()) {}

  async connect(deviceId: string, port: number, timeoutMs: number): Promise<StrategyResult> {
    if (!this.client.isAvailable()) {
      return {
        attempts: [
          {
            strategy: this.name,
            outcome: 'unavailable',
            detail: `no usbmuxd socket at ${this.client.socketPath}`,
          },
        ],
      };
    }

    try {
      const device = await this.client.findDevice(deviceId, timeoutMs);
      if (!device) {
        return { attempts: [{ strategy: this.name, outcome: 'not-found', detail: 'device not found' }] };
      }
      const socket = await this.client.connect(device, port, timeoutMs);
      return {
        socket,
        attempts: [
          {
            strategy: this.name,
            target: String(device.deviceId),
            outcome: 'connected',
            detail: device.connectionType ?? '',
          },
        ],
      };
    } catch (error) {
      return {
        attempts: [
          {
            strategy: this.name,
            outcome: 'connect-failed',
            detail: error instanceof Error ? error.message : String(error),
          },
        ],
      };
    }
  }
}
