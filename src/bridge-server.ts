import net, { AddressInfo } from 'net';
import { Dispatcher } from './dispatcher';
import { createSession, Session } from './handlers';
import {
  decodeRequest,
  encodeMessage,
  errorResponse,
  LineDecoder,
  successResponse,
} from './protocol/framing';
import { BridgeError, RpcResponse } from './types';
import { formatErrorForLog, formatErrorForResponse } from './utils/error';
import { ConnectionSocket, isLoopbackAddress, listen, writeAll } from './utils/net';

export type ListenerState = 'starting' | 'accepting' | 'draining' | 'stopped';

export interface BridgeServerOptions {
  host: string;
  port: number;
  // 0 disables the idle timeout
  idleTimeoutMs?: number;
}

/**
 * Loopback-only JSON-RPC listener. Every accepted connection runs its own serial
 * line loop with its own Session; the abort signal is the only state shared
 * between connections.
 */
export class BridgeServer {
  private server: net.Server | null = null;
  private readonly controller = new AbortController();
  private readonly connections = new Set<ConnectionSocket>();
  private listenerState: ListenerState = 'starting';
  private closed: Promise<void> = Promise.resolve();

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly options: BridgeServerOptions
  ) {}

  get state(): ListenerState {
    return this.listenerState;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  async start(): Promise<AddressInfo> {
    const server = net.createServer({ allowHalfOpen: true }, socket => {
      this.handleConnection(socket);
    });
    this.server = server;

    this.closed = new Promise(resolve => {
      server.once('close', () => {
        this.listenerState = 'stopped';
        resolve();
      });
    });

    const address = await listen(server, this.options.port, this.options.host);
    server.on('error', error => {
      console.error(`[bridge] listener error: ${formatErrorForLog(error)}`);
    });
    this.listenerState = 'accepting';
    return address;
  }

  // Stop accepting; open connections finish the line in flight and then close.
  stop(): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.listenerState = 'draining';
      this.controller.abort();
      if (this.server) {
        this.server.close();
      } else {
        this.listenerState = 'stopped';
      }
    }
    return this.closed;
  }

  waitUntilStopped(): Promise<void> {
    return this.closed;
  }

  handleConnection(socket: ConnectionSocket): void {
    if (!isLoopbackAddress(socket.remoteAddress) || this.controller.signal.aborted) {
      socket.destroy();
      return;
    }

    this.connections.add(socket);
    const session = createSession();
    const decoder = new LineDecoder();
    const queue: string[] = [];
    const idleTimeoutMs = this.options.idleTimeoutMs ?? 0;
    let processing = false;
    let peerEnded = false;
    let idleTimer: NodeJS.Timeout | undefined;

    const finish = () => {
      if (idleTimer) clearTimeout(idleTimer);
      if (!socket.destroyed && !socket.writableEnded) {
        socket.end(() => socket.destroy());
      }
    };

    const armIdleTimer = () => {
      if (idleTimeoutMs <= 0) return;
      if (idleTimer) clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        console.error(
          `[bridge] closing idle connection from ${socket.remoteAddress} after ${idleTimeoutMs}ms`
        );
        socket.destroy();
      }, idleTimeoutMs);
    };

    const drain = async (): Promise<void> => {
      if (processing) return;
      processing = true;
      if (idleTimer) clearTimeout(idleTimer);

      try {
        while (!socket.destroyed) {
          const line = queue.shift();
          if (line === undefined) break;

          const response = await this.handleLine(line, session);
          await writeAll(socket, encodeMessage(response));

          if (session.stopRequested) {
            void this.stop();
          }
          if (this.controller.signal.aborted) {
            queue.length = 0;
            break;
          }
        }
      } finally {
        processing = false;
      }

      if (socket.isPaused() && !socket.destroyed) {
        socket.resume();
      }
      if (peerEnded || this.controller.signal.aborted) {
        finish();
      } else {
        armIdleTimer();
      }
    };

    const schedule = () => {
      drain().catch(error => {
        console.error(`[bridge] connection from ${socket.remoteAddress} failed: ${formatErrorForLog(error)}`);
        socket.destroy();
      });
    };

    const onAbort = () => {
      if (!processing) finish();
    };
    this.controller.signal.addEventListener('abort', onAbort, { once: true });

    socket.on('data', (chunk: Buffer | string) => {
      if (this.controller.signal.aborted) return;
      queue.push(...decoder.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
      // Stop reading while a request is in flight; drain resumes once the queue is empty
      if (processing && queue.length > 0) {
        socket.pause();
      }
      schedule();
    });

    socket.on('end', () => {
      peerEnded = true;
      const dropped = decoder.end();
      if (dropped > 0) {
        console.error(`[bridge] discarded ${dropped} trailing bytes without newline`);
      }
      schedule();
    });

    socket.on('error', error => {
      console.error(`[bridge] socket error: ${error.message}`);
    });

    socket.on('close', () => {
      if (idleTimer) clearTimeout(idleTimer);
      this.controller.signal.removeEventListener('abort', onAbort);
      this.connections.delete(socket);
    });

    armIdleTimer();
  }

  // Never rejects: every failure becomes an error response for this line.
  async handleLine(line: string, session: Session): Promise<RpcResponse> {
    const decoded = decodeRequest(line);
    if (!decoded.ok) {
      return errorResponse(decoded.id, decoded.error.message);
    }

    const { request } = decoded;
    try {
      const result = await this.dispatcher.dispatch(request, session);
      return successResponse(request.id, result);
    } catch (error) {
      if (!(error instanceof BridgeError)) {
        console.error(`[bridge] internal error in '${request.method}': ${formatErrorForLog(error)}`);
      }
      return errorResponse(request.id, formatErrorForResponse(error));
    }
  }
}
