import fs from 'fs/promises';
import path from 'path';
import readline from 'readline';
import yargs, { Argv } from 'yargs';
import pkg from '../package.json';
import { BridgeServer } from './bridge-server';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_BYTES,
  DEFAULT_READ_TIMEOUT_MS,
  extractTree,
  parseParamsJson,
  rpcCall,
  RpcSession,
} from './client';
import { loadConfig } from './config';
import { Dispatcher } from './dispatcher';
import { ConnectionBroker } from './forwarder/broker';
import { buildRequest, isJsonObject } from './protocol/framing';
import { BridgeError, JsonObject, RpcResponse, SWIPE_DIRECTIONS, ValidationError } from './types';
import { AdbDriver, resolveAdbBinary, selectDevice } from './utils/adb';
import { formatErrorForLog, getErrorSuggestion } from './utils/error';

export const ARTIFACT_DIR = '/tmp/mobile-rpc-artifacts';

const PRINT_MODES = ['json', 'result', 'tree'] as const;
type PrintMode = (typeof PRINT_MODES)[number];
const CALL_PRINT_MODE: PrintMode = 'json';
const REPL_PRINT_MODE: PrintMode = 'tree';

interface ClientArgs {
  host?: string;
  port?: number;
  connectTimeout: number;
  readTimeout: number;
  maxBytes: number;
  pretty: boolean;
}

class RpcResponseError extends BridgeError {
  constructor(message: string) {
    super('RPC_ERROR', `RPC error: ${message}`);
    this.name = 'RpcResponseError';
  }
}

function withClientOptions<T>(y: Argv<T>) {
  return y
    .option('host', { type: 'string', describe: 'Bridge host (default 127.0.0.1)' })
    .option('port', { type: 'number', describe: 'Bridge port (default 45678)' })
    .option('connect-timeout', { type: 'number', default: DEFAULT_CONNECT_TIMEOUT_MS, describe: 'Connect timeout (ms)' })
    .option('read-timeout', { type: 'number', default: DEFAULT_READ_TIMEOUT_MS, describe: 'Read timeout (ms)' })
    .option('max-bytes', { type: 'number', default: DEFAULT_MAX_BYTES, describe: 'Largest accepted response' })
    .option('pretty', { type: 'boolean', default: false, describe: 'Pretty-print JSON output' });
}

function withId<T>(y: Argv<T>) {
  return withClientOptions(y).option('id', { type: 'number', default: 1, describe: 'Request id' });
}

function stringify(value: unknown, pretty: boolean): string {
  return JSON.stringify(value, null, pretty ? 2 : undefined) ?? 'null';
}

function ensureOk(response: RpcResponse): void {
  if ('error' in response) {
    throw new RpcResponseError(response.error.message);
  }
}

function printResponse(response: RpcResponse, mode: PrintMode, pretty: boolean): void {
  if (mode === 'tree') {
    console.log(extractTree(response) ?? stringify(response, pretty));
  } else if (mode === 'result') {
    console.log(stringify('result' in response ? response.result : null, pretty));
  } else {
    console.log(stringify(response, pretty));
  }
}

async function call(args: ClientArgs, id: number, method: string, params: JsonObject = {}): Promise<RpcResponse> {
  const config = loadConfig({ host: args.host, port: args.port });
  return rpcCall(config.host, config.port, buildRequest(id, method, params), {
    connectTimeoutMs: args.connectTimeout,
    readTimeoutMs: args.readTimeout,
    maxBytes: args.maxBytes,
  });
}

async function treeCommand(args: ClientArgs & { id: number }, method: string, params: JsonObject = {}): Promise<void> {
  const response = await call(args, args.id, method, params);
  printResponse(response, 'tree', args.pretty);
  ensureOk(response);
}

async function writeScreenshot(base64: string, kind: string, id: number): Promise<string> {
  await fs.mkdir(ARTIFACT_DIR, { recursive: true });
  const file = path.join(ARTIFACT_DIR, `${Math.floor(Date.now() / 1000)}_${kind}_${id}.png`);
  await fs.writeFile(file, Buffer.from(base64, 'base64'));
  console.error(`Wrote screenshot: ${file}`);
  return file;
}

function resultObject(response: RpcResponse): JsonObject | undefined {
  if (!('result' in response)) return undefined;
  return isJsonObject(response.result) ? response.result : undefined;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });
}

async function serve(argv: {
  host?: string;
  port?: number;
  serial?: string;
  adbBinary?: string;
  idleTimeout?: number;
}): Promise<void> {
  const config = loadConfig({
    host: argv.host,
    port: argv.port,
    serial: argv.serial,
    adbBinary: argv.adbBinary,
    idleTimeoutMs: argv.idleTimeout,
  });

  const adbBinary = resolveAdbBinary(config.adbBinary);
  const serial = await selectDevice(adbBinary, config.serial);
  const dispatcher = new Dispatcher(new AdbDriver(serial, adbBinary), {
    focusDelayMs: config.focusDelayMs,
    launchSettleMs: config.launchSettleMs,
  });
  const server = new BridgeServer(dispatcher, {
    host: config.host,
    port: config.port,
    idleTimeoutMs: config.idleTimeoutMs,
  });

  const address = await server.start();
  console.log(
    `MOBILE_RPC_READY platform=android serial=${serial} host=${address.address} port=${address.port}`
  );

  void waitForSignal().then(signal => {
    console.error(`[bridge] received ${signal}, shutting down`);
    return server.stop();
  });
  await server.waitUntilStopped();
  console.error('[bridge] stopped');
}

async function forward(argv: { udid: string; host?: string; port?: number; connectTimeout?: number }): Promise<void> {
  const config = loadConfig({ host: argv.host, port: argv.port, connectTimeoutMs: argv.connectTimeout });
  const broker = new ConnectionBroker({
    deviceId: argv.udid,
    host: config.host,
    port: config.port,
    connectTimeoutMs: config.connectTimeoutMs,
  });

  const address = await broker.start();
  console.error(`[forward] forwarding ${address.address}:${address.port} -> <device>:${config.port} (udid=${argv.udid})`);
  console.error('[forward] strategies: tunnel (*.coredevice.local), then usbmux');

  const signal = await waitForSignal();
  console.error(`[forward] received ${signal}, shutting down`);
  await broker.stop();
}

async function repl(args: ClientArgs & { print: PrintMode }): Promise<void> {
  const config = loadConfig({ host: args.host, port: args.port });
  const session = new RpcSession(config.host, config.port, {
    connectTimeoutMs: args.connectTimeout,
    readTimeoutMs: args.readTimeout,
    maxBytes: args.maxBytes,
  });
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr, prompt: '> ' });

  console.error("mobile-rpc-bridge REPL. Enter: <method> [<json_params_object>]. Use 'quit' to exit.");
  rl.prompt();
  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (line === 'quit' || line === 'exit') break;
      if (line) {
        await replLine(session, line, args);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    session.close();
  }
}

async function replLine(session: RpcSession, line: string, args: ClientArgs & { print: PrintMode }): Promise<void> {
  const match = /^(\S+)(?:\s+(.*))?$/.exec(line);
  if (!match) return;

  try {
    const response = await session.call(match[1], parseParamsJson(match[2]));
    printResponse(response, args.print, args.pretty);
    if ('error' in response) {
      console.error(`RPC error: ${response.error.message}`);
    }
  } catch (error) {
    console.error(`RPC failed: ${error instanceof Error ? error.message : String(error)}`);
    if (!(error instanceof ValidationError)) {
      session.close();
    }
  }
}

export function buildCli(args: string[]) {
  return yargs(args)
    .scriptName('mobile-rpc-bridge')
    .usage('$0 <command> [options]')
    .version(pkg.version)
    .command(
      'serve',
      'Run the bridge listener against an adb device',
      y =>
        y
          .option('host', { type: 'string' })
          .option('port', { type: 'number' })
          .option('serial', { type: 'string', describe: 'adb serial (default: the only attached device)' })
          .option('adb-binary', { type: 'string', describe: 'Path to adb' })
          .option('idle-timeout', { type: 'number', describe: 'Close connections idle this long (ms, 0 = never)' }),
      argv => serve(argv)
    )
    .command(
      'forward',
      'Forward a loopback port to the bridge listener on a device',
      y =>
        y
          .option('udid', { type: 'string', demandOption: true, describe: 'Device UDID or CoreDevice identifier' })
          .option('host', { type: 'string' })
          .option('port', { type: 'number' })
          .option('connect-timeout', { type: 'number', describe: 'Per-attempt remote connect timeout (ms)' }),
      argv => forward(argv)
    )
    .command(
      'call <method>',
      'Call any RPC method with JSON params',
      y =>
        withId(y)
          .positional('method', { type: 'string', demandOption: true })
          .option('params', { type: 'string', describe: `JSON object, e.g. '{"x":1}'` })
          .option('print', { choices: PRINT_MODES, default: CALL_PRINT_MODE }),
      async argv => {
        const response = await call(argv, argv.id, argv.method, parseParamsJson(argv.params));
        printResponse(response, argv.print, argv.pretty);
        ensureOk(response);
      }
    )
    .command('get-tree', 'get_tree (prints tree)', y => withId(y), argv => treeCommand(argv, 'get_tree'))
    .command(
      'get-context',
      `get_context (prints tree; writes screenshot to ${ARTIFACT_DIR})`,
      y => withId(y),
      async argv => {
        const response = await call(argv, argv.id, 'get_context');
        const result = resultObject(response);
        if (result && typeof result.screenshot_base64 === 'string') {
          await writeScreenshot(result.screenshot_base64, 'context', argv.id);
        }
        console.log(result && typeof result.tree === 'string' ? result.tree : stringify(response, argv.pretty));
        ensureOk(response);
      }
    )
    .command(
      'get-screen-image',
      `get_screen_image (writes screenshot to ${ARTIFACT_DIR})`,
      y => withId(y).option('print-metadata', { type: 'boolean', default: false }),
      async argv => {
        const response = await call(argv, argv.id, 'get_screen_image');
        const result = resultObject(response);
        if (!result) {
          console.log(stringify(response, argv.pretty));
          ensureOk(response);
          return;
        }
        if (typeof result.screenshot_base64 !== 'string') {
          throw new ValidationError('RPC response missing result.screenshot_base64');
        }
        await writeScreenshot(result.screenshot_base64, 'screen', argv.id);
        if (argv.printMetadata) {
          console.log(stringify(result.metadata ?? null, argv.pretty));
        }
      }
    )
    .command(
      'open-app <app-identifier>',
      'open_app (Android package name; prints tree)',
      y => withId(y).positional('app-identifier', { type: 'string', demandOption: true }),
      argv => treeCommand(argv, 'open_app', { bundle_identifier: argv.appIdentifier })
    )
    .command(
      'tap <x> <y>',
      'tap (prints tree)',
      y =>
        withId(y)
          .positional('x', { type: 'number', demandOption: true })
          .positional('y', { type: 'number', demandOption: true }),
      argv => treeCommand(argv, 'tap', { x: argv.x, y: argv.y })
    )
    .command(
      'tap-element',
      'tap_element (prints tree)',
      y =>
        withId(y)
          .option('coordinate', { type: 'string', demandOption: true, describe: "Frame like '{{x, y}, {w, h}}'" })
          .option('count', { type: 'number' })
          .option('long-press', { type: 'boolean', default: false }),
      argv => {
        const params: JsonObject = { coordinate: argv.coordinate };
        if (argv.count !== undefined) params.count = argv.count;
        if (argv.longPress) params.longPress = true;
        return treeCommand(argv, 'tap_element', params);
      }
    )
    .command(
      'enter-text',
      'enter_text (prints tree)',
      y =>
        withId(y)
          .option('coordinate', { type: 'string', demandOption: true })
          .option('text', { type: 'string', demandOption: true })
          .option('submit', { type: 'boolean', default: true, describe: 'Press Enter after the text' }),
      argv => treeCommand(argv, 'enter_text', { coordinate: argv.coordinate, text: argv.text, submit: argv.submit })
    )
    .command(
      'scroll <x> <y> <distance-x> <distance-y>',
      'scroll (prints tree)',
      y =>
        withId(y)
          .positional('x', { type: 'number', demandOption: true })
          .positional('y', { type: 'number', demandOption: true })
          .positional('distance-x', { type: 'number', demandOption: true })
          .positional('distance-y', { type: 'number', demandOption: true }),
      argv =>
        treeCommand(argv, 'scroll', { x: argv.x, y: argv.y, distanceX: argv.distanceX, distanceY: argv.distanceY })
    )
    .command(
      'swipe <x> <y> <direction>',
      'swipe (prints tree)',
      y =>
        withId(y)
          .positional('x', { type: 'number', demandOption: true })
          .positional('y', { type: 'number', demandOption: true })
          .positional('direction', { choices: SWIPE_DIRECTIONS, demandOption: true }),
      argv => treeCommand(argv, 'swipe', { x: argv.x, y: argv.y, direction: argv.direction })
    )
    .command(
      'stop',
      'stop (prints JSON response)',
      y => withId(y),
      async argv => {
        const response = await call(argv, argv.id, 'stop');
        console.log(stringify(response, argv.pretty));
        ensureOk(response);
      }
    )
    .command(
      'repl',
      'Interactive mode over one connection',
      y => withClientOptions(y).option('print', { choices: PRINT_MODES, default: REPL_PRINT_MODE }),
      argv => repl(argv)
    )
    .demandCommand(1)
    .strict()
    .fail((message, error) => {
      throw error ?? new ValidationError(`${message}. Run with --help for usage.`);
    });
}

export async function runCli(args: string[]): Promise<number> {
  try {
    await buildCli(args).parseAsync();
    return 0;
  } catch (error) {
    if (error instanceof BridgeError) {
      console.error(error.message);
      const suggestion = getErrorSuggestion(error);
      if (suggestion) {
        console.error(`hint: ${suggestion}`);
      }
    } else {
      console.error(`mobile-rpc-bridge: ${formatErrorForLog(error)}`);
    }
    return 1;
  }
}
