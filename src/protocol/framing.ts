import {
  FramingError,
  JsonObject,
  JsonValue,
  RequestId,
  RpcRequest,
  RpcResponse,
} from '../types';

const NEWLINE = 0x0a;

export type DecodedRequest =
  | { ok: true; request: RpcRequest }
  | { ok: false; id: RequestId; error: FramingError };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRequestId(value: unknown): RequestId {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value === null
  ) {
    return value;
  }
  return null;
}

// Serialize one message as a single line. JSON string escaping keeps newlines out of the payload.
export function encodeMessage(message: RpcRequest | RpcResponse): Buffer {
  return Buffer.from(`${JSON.stringify(message)}\n`, 'utf-8');
}

export function buildRequest(id: RequestId, method: string, params: JsonObject = {}): RpcRequest {
  return { id, method, params: { ...params } };
}

export function successResponse(id: RequestId, result: JsonValue): RpcResponse {
  return { id, result };
}

export function errorResponse(id: RequestId, message: string): RpcResponse {
  return { id, error: { message } };
}

export function decodeRequest(line: string): DecodedRequest {
  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch {
    return { ok: false, id: null, error: new FramingError('Invalid JSON payload', { line }) };
  }

  if (!isJsonObject(payload)) {
    return { ok: false, id: null, error: new FramingError('Invalid JSON payload', { line }) };
  }

  const id = toRequestId(payload.id);
  const method = payload.method;
  const params = payload.params === undefined ? {} : payload.params;

  if (method === undefined || method === null) {
    return { ok: false, id, error: new FramingError("Missing 'method' field") };
  }
  if (typeof method !== 'string' || method.length === 0) {
    return { ok: false, id, error: new FramingError("Field 'method' must be a string") };
  }
  if (!isJsonObject(params)) {
    return { ok: false, id, error: new FramingError("Field 'params' must be an object") };
  }

  return { ok: true, request: { id, method, params } };
}

export function decodeResponse(line: string): RpcResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch (error) {
    const head = line.slice(0, 200);
    throw new FramingError(
      `Invalid JSON response: ${error instanceof Error ? error.message : String(error)}. Head=${JSON.stringify(head)}`
    );
  }

  if (!isJsonObject(payload)) {
    throw new FramingError('Invalid JSON response: expected an object');
  }

  const id = toRequestId(payload.id);
  const hasResult = 'result' in payload;
  const error = payload.error;

  if (error !== undefined) {
    if (hasResult) {
      throw new FramingError('Invalid JSON response: both result and error present');
    }
    const message =
      isJsonObject(error) && typeof error.message === 'string'
        ? error.message
        : JSON.stringify(error);
    return { id, error: { message } };
  }

  if (!hasResult) {
    throw new FramingError('Invalid JSON response: missing result');
  }

  return { id, result: payload.result };
}

/**
 * Accumulates bytes from a stream and yields complete newline-terminated lines.
 * Anything after the last newline stays pending until more data arrives.
 */
export class LineDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): string[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const lines: string[] = [];

    let newlineIndex = this.buffer.indexOf(NEWLINE);
    while (newlineIndex !== -1) {
      const line = this.buffer.subarray(0, newlineIndex).toString('utf-8').trim();
      this.buffer = this.buffer.subarray(newlineIndex + 1);
      if (line) {
        lines.push(line);
      }
      newlineIndex = this.buffer.indexOf(NEWLINE);
    }

    return lines;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  // Incomplete trailing data is dropped at end of stream; returns how many bytes were discarded.
  end(): number {
    const dropped = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    return dropped;
  }
}
