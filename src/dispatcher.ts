import {
  createHandlers,
  HandlerContext,
  HandlerTiming,
  METHOD_CATALOG,
  MethodHandler,
  Session,
} from './handlers';
import { DeviceDriver, InternalError, JsonValue, RpcRequest, UnsupportedMethodError } from './types';

export const DEFAULT_TIMING: HandlerTiming = {
  focusDelayMs: 200,
  launchSettleMs: 800,
};

// Fails at startup when the registry and the method catalog disagree
export function validateRegistry(registry: Record<string, MethodHandler>): void {
  const catalog = new Set<string>(METHOD_CATALOG);
  const registered = Object.keys(registry);
  const missing = METHOD_CATALOG.filter(method => !registered.includes(method));
  const extra = registered.filter(method => !catalog.has(method));

  if (missing.length > 0 || extra.length > 0) {
    throw new InternalError(
      `handler registry does not match the method catalog (missing: ${missing.join(', ') || 'none'}; unexpected: ${extra.join(', ') || 'none'})`,
      { missing, extra }
    );
  }
}

/**
 * Routes one request to its handler. Holds no per-connection state itself: the
 * caller passes the connection's Session with every request.
 */
export class Dispatcher {
  private readonly handlers: Map<string, MethodHandler>;

  constructor(
    private readonly driver: DeviceDriver,
    private readonly timing: HandlerTiming = DEFAULT_TIMING,
    registry: Record<string, MethodHandler> = createHandlers()
  ) {
    validateRegistry(registry);
    this.handlers = new Map(Object.entries(registry));
  }

  get methods(): string[] {
    return Array.from(this.handlers.keys());
  }

  async dispatch(request: RpcRequest, session: Session): Promise<JsonValue> {
    const handler = this.handlers.get(request.method);
    if (!handler) {
      throw new UnsupportedMethodError(request.method);
    }

    const context: HandlerContext = {
      driver: this.driver,
      session,
      timing: this.timing,
    };
    return handler(request.params, context);
  }
}
