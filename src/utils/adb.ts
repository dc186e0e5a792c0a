import { execFile } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ADBCommandError,
  ADBNotFoundError,
  AndroidDevice,
  DeviceDriver,
  DeviceNotFoundError,
  LaunchOutcome,
  LaunchTarget,
  MultipleDevicesFoundError,
  NoDevicesFoundError,
  ScreenSize,
  ScreenshotCaptureError,
  ToolError,
} from '../types';
import { isPNG } from './screenshot';

// Default timeout for ADB commands (5 seconds)
const DEFAULT_TIMEOUT = 5000;
const DEFAULT_BINARY_MAX_BUFFER = 50 * 1024 * 1024;
const UI_DUMP_PATH = '/sdcard/window_dump.xml';
const TEXT_CHUNK_SIZE = 80;
const ADB_TEXT_SPECIALS = new Set('\\"\'`()[]{}<>|;&*~$');
const LAUNCHER_CATEGORY = 'android.intent.category.LAUNCHER';

export interface ADBCommandResult {
  stdout: Buffer;
  stderr: Buffer;
  exitCode: number;
}

export interface ADBCommandOptions {
  timeout?: number;
  // When false a non-zero exit status resolves instead of rejecting
  check?: boolean;
}

export type ADBCommandRunner = (
  adbBinary: string,
  args: string[],
  options?: ADBCommandOptions
) => Promise<ADBCommandResult>;

function describeFailure(result: ADBCommandResult): string {
  const stderr = result.stderr.toString('utf-8').trim();
  const stdout = result.stdout.toString('utf-8').trim();
  return stderr || stdout || `exit=${result.exitCode}`;
}

export function combinedOutput(result: ADBCommandResult): string {
  return `${result.stdout.toString('utf-8')}\n${result.stderr.toString('utf-8')}`;
}

// Execute ADB command with error handling
export function executeADBCommand(
  adbBinary: string,
  args: string[],
  options: ADBCommandOptions = {}
): Promise<ADBCommandResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const check = options.check !== false;
  const commandLine = [adbBinary, ...args].join(' ');

  return new Promise((resolve, reject) => {
    execFile(
      adbBinary,
      args,
      { encoding: 'buffer', timeout, maxBuffer: DEFAULT_BINARY_MAX_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }

        if (error.code === 'ENOENT') {
          reject(new ADBNotFoundError());
          return;
        }

        if (typeof error.code === 'number' && !error.killed) {
          const result = { stdout, stderr, exitCode: error.code };
          if (!check) {
            resolve(result);
            return;
          }
          reject(
            new ADBCommandError(
              'ADB_COMMAND_FAILED',
              `adb command failed (${commandLine}): ${describeFailure(result)}`,
              { args, exitCode: error.code }
            )
          );
          return;
        }

        const reason = error.killed ? `timed out after ${timeout}ms` : error.message;
        reject(
          new ADBCommandError('ADB_COMMAND_FAILED', `adb command failed (${commandLine}): ${reason}`, {
            args,
            error: error.message,
          })
        );
      }
    );
  });
}

function isExecutable(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

// Explicit path, then MOBILE_RPC_ADB, then PATH, then the usual SDK locations
export function resolveAdbBinary(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (explicit) {
    return explicit;
  }
  if (env.MOBILE_RPC_ADB) {
    return env.MOBILE_RPC_ADB;
  }

  const executable = process.platform === 'win32' ? 'adb.exe' : 'adb';
  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, executable);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }

  const sdkRoots = [
    env.ANDROID_HOME ?? '',
    env.ANDROID_SDK_ROOT ?? '',
    path.join(os.homedir(), 'Library', 'Android', 'sdk'),
  ];
  for (const root of sdkRoots) {
    if (!root) continue;
    const candidate = path.join(root, 'platform-tools', executable);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }

  throw new ADBNotFoundError();
}

// Parse device list from ADB output
export function parseDeviceList(output: string): AndroidDevice[] {
  const lines = output.trim().split('\n');
  const devices: AndroidDevice[] = [];

  // Skip header line
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const status = parts[1];
    const device: AndroidDevice = {
      id: parts[0],
      status:
        status === 'device' || status === 'offline' || status === 'unauthorized'
          ? status
          : 'unknown',
    };

    for (let j = 2; j < parts.length; j++) {
      const part = parts[j];
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('product:')) {
        device.product = part.substring(8);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      } else if (part.startsWith('usb:')) {
        device.usb = part.substring(4);
      } else if (part.startsWith('product_string:')) {
        device.productString = part.substring(15);
      }
    }

    devices.push(device);
  }

  return devices;
}

export async function getConnectedDevices(
  adbBinary: string,
  run: ADBCommandRunner = executeADBCommand
): Promise<AndroidDevice[]> {
  const result = await run(adbBinary, ['devices', '-l']);
  return parseDeviceList(result.stdout.toString('utf-8'));
}

/**
 * Pick the device to drive: the requested serial, or the only attached device.
 * The chosen device must report `device` from `adb get-state`.
 */
export async function selectDevice(
  adbBinary: string,
  serial?: string,
  run: ADBCommandRunner = executeADBCommand
): Promise<string> {
  let target = serial;

  if (!target) {
    const ready = (await getConnectedDevices(adbBinary, run)).filter(
      device => device.status === 'device'
    );
    if (ready.length === 0) {
      throw new NoDevicesFoundError();
    }
    if (ready.length > 1) {
      throw new MultipleDevicesFoundError(ready.map(device => device.id));
    }
    target = ready[0].id;
  }

  const probe = await run(adbBinary, ['-s', target, 'get-state'], { check: false });
  const state = probe.stdout.toString('utf-8').trim();
  if (probe.exitCode !== 0 || state !== 'device') {
    throw new DeviceNotFoundError(target, probe.stderr.toString('utf-8').trim() || state);
  }

  return target;
}

export function escapeAdbInputText(text: string): string {
  let escaped = '';
  for (const ch of text) {
    if (ch === ' ' || ch === '\t') {
      escaped += '%s';
    } else if (ADB_TEXT_SPECIALS.has(ch)) {
      escaped += `\\${ch}`;
    } else {
      escaped += ch;
    }
  }
  return escaped;
}

export function chunkText(text: string, size: number = TEXT_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

export function parseWindowSize(output: string): ScreenSize {
  const raw = output.trim();
  const physicalMatch = raw.match(/Physical size:\s*(\d+)\s*x\s*(\d+)/i);
  const overrideMatch = raw.match(/Override size:\s*(\d+)\s*x\s*(\d+)/i);
  const anyMatch = raw.match(/(\d+)\s*x\s*(\d+)/);

  const match = overrideMatch ?? physicalMatch ?? anyMatch;
  if (!match) {
    throw new ADBCommandError(
      'WINDOW_SIZE_NOT_FOUND',
      `failed to read screen size from: ${JSON.stringify(raw)}`,
      { output: raw }
    );
  }

  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

export function parseForegroundPackage(output: string): string | undefined {
  const patterns = [/mCurrentFocus=.*? ([A-Za-z0-9_.]+)\//, /mFocusedApp=.*? ([A-Za-z0-9_.]+)\//];
  for (const pattern of patterns) {
    const match = output.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export function parseResolvedComponent(output: string): string | undefined {
  const lines = output
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
  return lines.reverse().find(line => line.includes('/'));
}

export class AdbDriver implements DeviceDriver {
  readonly platform = 'android';

  constructor(
    readonly serial: string,
    private readonly adbBinary: string,
    private readonly run: ADBCommandRunner = executeADBCommand
  ) {}

  private adb(args: string[], options?: ADBCommandOptions): Promise<ADBCommandResult> {
    return this.run(this.adbBinary, ['-s', this.serial, ...args], options);
  }

  async captureHierarchy(): Promise<string> {
    await this.adb(['shell', 'uiautomator', 'dump', UI_DUMP_PATH], { timeout: 12000 });
    const result = await this.adb(['exec-out', 'cat', UI_DUMP_PATH], { timeout: 12000 });

    let raw = result.stdout.toString('utf-8');
    const start = raw.indexOf('<?xml');
    if (start !== -1) {
      raw = raw.slice(start);
    }
    if (!raw.includes('<hierarchy')) {
      throw new ToolError('UI_DUMP_FAILED', 'uiautomator dump did not return XML hierarchy', {
        deviceId: this.serial,
      });
    }

    return raw.trim();
  }

  async captureScreenImage(): Promise<Buffer> {
    const result = await this.adb(['exec-out', 'screencap', '-p'], { timeout: 15000 });
    if (!isPNG(result.stdout)) {
      throw new ScreenshotCaptureError(this.serial, 'device screencap did not return PNG bytes');
    }
    return result.stdout;
  }

  async sendTap(x: number, y: number): Promise<void> {
    await this.adb(['shell', 'input', 'tap', String(x), String(y)], { timeout: 8000 });
  }

  async sendSwipe(x1: number, y1: number, x2: number, y2: number, durationMs: number): Promise<void> {
    await this.adb(
      ['shell', 'input', 'swipe', String(x1), String(y1), String(x2), String(y2), String(durationMs)],
      { timeout: 10000 }
    );
  }

  async sendText(text: string): Promise<void> {
    for (const chunk of chunkText(text)) {
      const escaped = escapeAdbInputText(chunk);
      if (escaped) {
        await this.adb(['shell', 'input', 'text', escaped], { timeout: 10000 });
      }
    }
  }

  async sendKeyEvent(code: number): Promise<void> {
    await this.adb(['shell', 'input', 'keyevent', String(code)], { timeout: 8000 });
  }

  async queryScreenSize(): Promise<ScreenSize> {
    const result = await this.adb(['shell', 'wm', 'size'], { timeout: 8000 });
    return parseWindowSize(result.stdout.toString('utf-8'));
  }

  async queryForegroundApp(): Promise<string | undefined> {
    const result = await this.adb(['shell', 'dumpsys', 'window', 'windows'], {
      timeout: 12000,
      check: false,
    });
    return parseForegroundPackage(result.stdout.toString('utf-8'));
  }

  async resolveLaunchTarget(packageName: string): Promise<string | undefined> {
    const result = await this.adb(
      ['shell', 'cmd', 'package', 'resolve-activity', '--brief', packageName],
      { timeout: 10000, check: false }
    );
    if (result.exitCode !== 0) {
      return undefined;
    }
    return parseResolvedComponent(result.stdout.toString('utf-8'));
  }

  async launch(target: LaunchTarget): Promise<LaunchOutcome> {
    if (target.kind === 'component') {
      const result = await this.adb(['shell', 'am', 'start', '-W', '-n', target.component], {
        timeout: 12000,
        check: false,
      });
      const output = combinedOutput(result);
      return { ok: result.exitCode === 0 && !output.includes('Error:'), output: output.trim() };
    }

    const result = await this.adb(
      ['shell', 'monkey', '-p', target.packageName, '-c', LAUNCHER_CATEGORY, '1'],
      { timeout: 12000, check: false }
    );
    const output = combinedOutput(result);
    return {
      ok: result.exitCode === 0 && !output.includes('No activities found to run'),
      output: output.trim(),
    };
  }
}
