import { Duplex } from 'stream';
import {
  buildRequest,
  decodeResponse,
  encodeMessage,
  isJsonObject,
  LineDecoder,
} from './protocol/framing';
import { JsonObject, RpcRequest, RpcResponse, TransportError, ValidationError } from './types';
import { connectWithTimeout, writeAll } from './utils/net';

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_READ_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

export interface RpcCallOptions {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  maxBytes?: number;
}

type ResolvedCallOptions = Required<RpcCallOptions>;

function withDefaults(options: RpcCallOptions): ResolvedCallOptions {
  return {
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    readTimeoutMs: options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS,
    maxBytes: options.maxBytes ?? DEFAULT_MAX_BYTES,
  };
}

/**
 * Hands out response lines from one socket, one `next()` at a time.
 */
class LineReader {
  private readonly decoder = new LineDecoder();
  private readonly lines: string[] = [];
  private waiter: ((line: string | Error) => void) | undefined;
  private failure: Error | undefined;

  constructor(
    socket: Duplex,
    private readonly maxBytes: number
  ) {
    socket.on('data', (chunk: Buffer | string) => {
      this.lines.push(...this.decoder.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
      if (this.decoder.pendingBytes > this.maxBytes) {
        this.fail(new TransportError(`Response exceeded max size (${this.maxBytes} bytes)`));
        socket.destroy();
        return;
      }
      this.flush();
    });
    socket.on('end', () => {
      this.decoder.end();
      this.fail(new TransportError('Empty response (server closed the connection)'));
    });
    socket.on('error', error => {
      this.fail(new TransportError(`connection failed: ${error.message}`));
    });
    socket.on('close', () => {
      this.fail(new TransportError('Empty response (server closed the connection)'));
    });
  }

  next(timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        reject(new TransportError(`no response within ${timeoutMs}ms`));
      }, timeoutMs);

      this.waiter = value => {
        clearTimeout(timer);
        this.waiter = undefined;
        if (value instanceof Error) {
          reject(value);
        } else {
          resolve(value);
        }
      };
      this.flush();
    });
  }

  private fail(error: Error): void {
    this.failure ??= error;
    this.flush();
  }

  private flush(): void {
    if (!this.waiter) return;
    const line = this.lines.shift();
    if (line !== undefined) {
      this.waiter(line);
    } else if (this.failure) {
      this.waiter(this.failure);
    }
  }
}

/**
 * One request on a fresh connection: send, read a single response line, close.
 */
export async function rpcCall(
  host: string,
  port: number,
  request: RpcRequest,
  options: RpcCallOptions = {}
): Promise<RpcResponse> {
  const { connectTimeoutMs, readTimeoutMs, maxBytes } = withDefaults(options);
  const socket = await connectWithTimeout(host, port, connectTimeoutMs);

  try {
    const reader = new LineReader(socket, maxBytes);
    await writeAll(socket, encodeMessage(request));
    return decodeResponse(await reader.next(readTimeoutMs));
  } finally {
    socket.destroy();
  }
}

/**
 * A persistent connection issuing requests with ids 1, 2, 3...
 * Calls are serialized; the server answers one line at a time.
 */
export class RpcSession {
  private socket: Duplex | undefined;
  private reader: LineReader | undefined;
  private nextId = 1;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly options: ResolvedCallOptions;

  constructor(
    private readonly host: string,
    private readonly port: number,
    options: RpcCallOptions = {}
  ) {
    this.options = withDefaults(options);
  }

  async connect(): Promise<void> {
    if (this.socket) return;
    const socket = await connectWithTimeout(this.host, this.port, this.options.connectTimeoutMs);
    this.socket = socket;
    this.reader = new LineReader(socket, this.options.maxBytes);
  }

  call(method: string, params: JsonObject = {}): Promise<RpcResponse> {
    const result = this.tail.then(() => this.send(method, params));
    this.tail = result.catch(() => undefined);
    return result;
  }

  close(): void {
    this.socket?.destroy();
    this.socket = undefined;
    this.reader = undefined;
  }

  private async send(method: string, params: JsonObject): Promise<RpcResponse> {
    await this.connect();
    const { socket, reader } = this;
    if (!socket || !reader) {
      throw new TransportError(`not connected to ${this.host}:${this.port}`);
    }

    const request = buildRequest(this.nextId++, method, params);
    await writeAll(socket, encodeMessage(request));
    return decodeResponse(await reader.next(this.options.readTimeoutMs));
  }
}

export function extractTree(response: RpcResponse): string | undefined {
  if (!('result' in response)) return undefined;
  const { result } = response;
  if (!isJsonObject(result)) return undefined;
  const tree = result.tree;
  return typeof tree === 'string' ? tree : undefined;
}

export function parseParamsJson(raw: string | undefined): JsonObject {
  if (!raw) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `--params must be valid JSON. ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isJsonObject(parsed)) {
    throw new ValidationError(`--params must be a JSON object (e.g. '{"x":1}')`);
  }
  return parsed;
}
