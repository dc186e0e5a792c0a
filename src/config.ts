import { z } from 'zod';
import { ValidationError } from './types';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 45678;

const port = z.coerce.number().int().min(0).max(65535);
const duration = z.coerce.number().int().min(0);

export const BridgeConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_HOST),
  port: port.default(DEFAULT_PORT),
  adbBinary: z.string().min(1).optional(),
  serial: z.string().min(1).optional(),
  // 0 disables the idle timeout; a stalled peer then keeps its connection open
  idleTimeoutMs: duration.default(0),
  connectTimeoutMs: duration.default(2000),
  focusDelayMs: duration.default(200),
  launchSettleMs: duration.default(800),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;

const ENV_KEYS: Record<string, keyof BridgeConfig> = {
  MOBILE_RPC_HOST: 'host',
  MOBILE_RPC_PORT: 'port',
  MOBILE_RPC_ADB: 'adbBinary',
  MOBILE_RPC_SERIAL: 'serial',
  MOBILE_RPC_IDLE_TIMEOUT_MS: 'idleTimeoutMs',
  MOBILE_RPC_CONNECT_TIMEOUT_MS: 'connectTimeoutMs',
};

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Defaults, then environment, then explicit overrides (CLI flags, tests).
 * Undefined overrides do not mask lower layers.
 */
export function loadConfig(
  overrides: BridgeConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): BridgeConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = BridgeConfigSchema.safeParse({ ...fromEnv(env), ...defined });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `invalid configuration value for '${issue.path.join('.')}': ${issue.message}`,
      { issues: parsed.error.issues }
    );
  }

  return parsed.data;
}
