import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { connectWithTimeout } from '../utils/net';
import { ConnectStrategy, Connector, StrategyAttempt, StrategyResult } from './types';

export const TUNNEL_HOST_SUFFIX = '.coredevice.local';

// devicectl rejects timeouts under 5 seconds
const MIN_DEVICECTL_TIMEOUT_S = 5;

const DevicectlDeviceSchema = z
  .object({
    identifier: z.string().optional(),
    hardwareProperties: z.object({ udid: z.string().optional() }).passthrough().optional(),
    connectionProperties: z
      .object({ potentialHostnames: z.array(z.string()).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const DevicectlOutputSchema = z
  .object({
    result: z
      .object({ devices: z.array(DevicectlDeviceSchema).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type DevicectlOutput = z.infer<typeof DevicectlOutputSchema>;

export interface HostnameLookup {
  hostnames: string[];
  error?: string;
}

export interface HostnameSource {
  lookup(deviceId: string): Promise<HostnameLookup>;
}

/**
 * Tunnel hostnames advertised for the first listed device whose identifier,
 * hardware udid or any advertised hostname matches `deviceId`.
 */
export function matchTunnelHostnames(output: DevicectlOutput, deviceId: string): string[] {
  const wanted = deviceId.toLowerCase();

  for (const device of output.result?.devices ?? []) {
    const identifier = (device.identifier ?? '').toLowerCase();
    const udid = (device.hardwareProperties?.udid ?? '').toLowerCase();
    const hostnames = device.connectionProperties?.potentialHostnames ?? [];

    if (
      wanted === identifier ||
      wanted === udid ||
      hostnames.some(hostname => hostname.toLowerCase().includes(wanted))
    ) {
      return hostnames.filter(hostname => hostname.endsWith(TUNNEL_HOST_SUFFIX));
    }
  }

  return [];
}

export function tunnelCandidates(deviceId: string, discovered: string[]): string[] {
  const primary = deviceId.endsWith(TUNNEL_HOST_SUFFIX)
    ? deviceId
    : `${deviceId}${TUNNEL_HOST_SUFFIX}`;
  return Array.from(new Set([primary, ...discovered]));
}

function runDevicectl(args: string[], timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile('xcrun', ['devicectl', ...args], { timeout: timeoutMs }, error => {
      // A non-zero exit may still leave a usable JSON file behind
      if (error && (error.code === 'ENOENT' || error.killed)) {
        reject(new Error(error.code === 'ENOENT' ? 'xcrun not available' : 'devicectl timed out'));
        return;
      }
      resolve();
    });
  });
}

// Asks `xcrun devicectl list devices` for extra tunnel hostnames
export class DevicectlHostnameSource implements HostnameSource {
  constructor(private readonly timeoutMs: number = 8000) {}

  async lookup(deviceId: string): Promise<HostnameLookup> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mobile-rpc-devicectl-'));
    const outPath = path.join(dir, 'devices.json');
    const timeoutSeconds = Math.max(MIN_DEVICECTL_TIMEOUT_S, Math.floor(this.timeoutMs / 1000));

    try {
      await runDevicectl(
        ['--timeout', String(timeoutSeconds), 'list', 'devices', '--json-output', outPath],
        (timeoutSeconds + 2) * 1000
      );
      const parsed = DevicectlOutputSchema.safeParse(JSON.parse(await fs.readFile(outPath, 'utf-8')));
      if (!parsed.success) {
        return { hostnames: [], error: 'devicectl returned an unexpected device list' };
      }
      return { hostnames: matchTunnelHostnames(parsed.data, deviceId) };
    } catch (error) {
      return { hostnames: [], error: error instanceof Error ? error.message : String(error) };
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

export class TunnelStrategy implements ConnectStrategy {
  readonly name = 'tunnel';

  constructor(
    private readonly source: HostnameSource = new DevicectlHostnameSource(),
    private readonly connector: Connector = connectWithTimeout
  ) {}

  async connect(deviceId: string, port: number, timeoutMs: number): Promise<StrategyResult> {
    const attempts: StrategyAttempt[] = [];
    const lookup = await this.source.lookup(deviceId);
    if (lookup.error) {
      attempts.push({ strategy: 'devicectl', outcome: 'unavailable', detail: lookup.error });
    }

    for (const host of tunnelCandidates(deviceId, lookup.hostnames)) {
      try {
        const socket = await this.connector(host, port, timeoutMs);
        attempts.push({ strategy: this.name, target: host, outcome: 'connected', detail: '' });
        return { socket, attempts };
      } catch (error) {
        attempts.push({
          strategy: this.name,
          target: host,
          outcome: 'connect-failed',
          detail: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return { attempts };
  }
}
