import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import {
  BridgeError,
  DeviceDriver,
  EnterTextParamsSchema,
  JsonObject,
  JsonValue,
  KEYCODE_ENTER,
  OpenAppParamsSchema,
  Point,
  ScrollParamsSchema,
  SetApiKeyParamsSchema,
  SWIPE_DIRECTIONS,
  SwipeDirection,
  SwipeParamsSchema,
  TapElementParamsSchema,
  TapParamsSchema,
  ToolError,
  ValidationError,
} from './types';
import { clampToScreen, parseRect, rectCenter, roundHalfEven } from './utils/geometry';
import { formatHierarchyXml } from './utils/hierarchy';
import { screenImagePayload } from './utils/screenshot';

const LONG_PRESS_DURATION_MS = 550;
const GESTURE_DURATION_MS = 220;
const MIN_SWIPE_SPAN = 180;
const PACKAGE_NAME_REGEX = /^[A-Za-z][A-Za-z0-9_]*(?:\.[A-Za-z][A-Za-z0-9_]*)+$/;

export const METHOD_CATALOG = [
  'get_tree',
  'get_screen_image',
  'get_context',
  'tap',
  'tap_element',
  'enter_text',
  'scroll',
  'swipe',
  'open_app',
  'set_api_key',
  'submit_prompt',
  'stop',
] as const;

export type MethodName = (typeof METHOD_CATALOG)[number];

// Per-connection state. Never shared between connections.
export interface Session {
  apiKey?: string;
  stopRequested: boolean;
}

export function createSession(): Session {
  return { stopRequested: false };
}

export interface HandlerTiming {
  focusDelayMs: number;
  launchSettleMs: number;
}

export interface HandlerContext {
  driver: DeviceDriver;
  session: Session;
  timing: HandlerTiming;
}

export type MethodHandler = (params: JsonObject, context: HandlerContext) => Promise<JsonValue>;

export type HandlerRegistry = Record<MethodName, MethodHandler>;

export function parseParams<T extends z.ZodTypeAny>(schema: T, params: JsonObject): z.output<T> {
  const parsed = schema.safeParse(params);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const key = issue.path.length > 0 ? String(issue.path[0]) : 'params';
  if (issue.path.length > 0 && params[key] === undefined) {
    throw new ValidationError(`missing parameter '${key}'`, { parameter: key });
  }
  throw new ValidationError(`parameter '${key}' ${issue.message}`, {
    parameter: key,
    value: params[key],
  });
}

async function currentTree(driver: DeviceDriver): Promise<string> {
  return formatHierarchyXml(await driver.captureHierarchy());
}

function isSwipeDirection(value: string): value is SwipeDirection {
  return SWIPE_DIRECTIONS.some(direction => direction === value);
}

function swipeDestination(origin: Point, direction: SwipeDirection, span: number): Point {
  switch (direction) {
    case 'up':
      return { x: origin.x, y: origin.y - span };
    case 'down':
      return { x: origin.x, y: origin.y + span };
    case 'left':
      return { x: origin.x - span, y: origin.y };
    case 'right':
      return { x: origin.x + span, y: origin.y };
  }
}

export function resolvePackageName(params: z.output<typeof OpenAppParamsSchema>): string {
  const raw = params.bundle_identifier || params.package_name || '';
  const packageName = String(raw).trim();

  if (!packageName) {
    throw new ValidationError('bundle_identifier is required', { parameter: 'bundle_identifier' });
  }
  if (!PACKAGE_NAME_REGEX.test(packageName)) {
    throw new ValidationError(
      `bundle_identifier '${packageName}' is not a valid Android package name`,
      { parameter: 'bundle_identifier', value: packageName }
    );
  }

  return packageName;
}

// Launcher component first, then the generic launcher intent.
async function launchPackage(driver: DeviceDriver, packageName: string): Promise<void> {
  const component = await driver.resolveLaunchTarget(packageName);
  if (component) {
    const started = await driver.launch({ kind: 'component', component });
    if (started.ok) {
      return;
    }
  }

  const fallback = await driver.launch({ kind: 'package', packageName });
  if (!fallback.ok) {
    throw new ToolError('APP_LAUNCH_FAILED', `failed to open app '${packageName}': ${fallback.output}`, {
      packageName,
    });
  }
}

export function createHandlers(): HandlerRegistry {
  return {
    get_tree: async (_params, { driver }) => ({ tree: await currentTree(driver) }),

    get_screen_image: async (_params, { driver }) =>
      screenImagePayload(await driver.captureScreenImage()),

    get_context: async (_params, { driver }) => {
      const tree = await currentTree(driver);
      const png = await driver.captureScreenImage();
      return { tree, ...screenImagePayload(png) };
    },

    tap: async (params, { driver }) => {
      const input = parseParams(TapParamsSchema, params);
      await driver.sendTap(roundHalfEven(input.x), roundHalfEven(input.y));
      return { tree: await currentTree(driver) };
    },

    tap_element: async (params, { driver }) => {
      const input = parseParams(TapElementParamsSchema, params);
      const center = rectCenter(parseRect(input.coordinate));

      let count = input.count;
      if (input.longPress) {
        await driver.sendSwipe(center.x, center.y, center.x, center.y, LONG_PRESS_DURATION_MS);
        count = 1;
      } else {
        for (let i = 0; i < count; i++) {
          await driver.sendTap(center.x, center.y);
        }
      }

      return {
        coordinate: input.coordinate,
        count,
        longPress: input.longPress,
        tree: await currentTree(driver),
      };
    },

    enter_text: async (params, { driver, timing }) => {
      const input = parseParams(EnterTextParamsSchema, params);
      const center = rectCenter(parseRect(input.coordinate));

      await driver.sendTap(center.x, center.y);
      await delay(timing.focusDelayMs);

      if (input.text) {
        const lines = input.text.split('\n');
        for (let i = 0; i < lines.length; i++) {
          if (lines[i]) {
            await driver.sendText(lines[i]);
          }
          if (i < lines.length - 1) {
            await driver.sendKeyEvent(KEYCODE_ENTER);
          }
        }
      }
      if (input.submit) {
        await driver.sendKeyEvent(KEYCODE_ENTER);
      }

      return { coordinate: input.coordinate, tree: await currentTree(driver) };
    },

    scroll: async (params, { driver }) => {
      const input = parseParams(ScrollParamsSchema, params);
      const origin = { x: roundHalfEven(input.x), y: roundHalfEven(input.y) };
      const screen = await driver.queryScreenSize();
      const destination = clampToScreen(
        {
          x: origin.x + roundHalfEven(input.distanceX),
          y: origin.y + roundHalfEven(input.distanceY),
        },
        screen
      );

      await driver.sendSwipe(origin.x, origin.y, destination.x, destination.y, GESTURE_DURATION_MS);
      return { tree: await currentTree(driver) };
    },

    swipe: async (params, { driver }) => {
      const input = parseParams(SwipeParamsSchema, params);
      if (!isSwipeDirection(input.direction)) {
        throw new ValidationError(`direction must be one of: ${SWIPE_DIRECTIONS.join(', ')}`, {
          parameter: 'direction',
          value: input.direction,
        });
      }

      const origin = { x: roundHalfEven(input.x), y: roundHalfEven(input.y) };
      const screen = await driver.queryScreenSize();
      const span = Math.max(MIN_SWIPE_SPAN, Math.floor(Math.min(screen.width, screen.height) / 2));
      const destination = clampToScreen(swipeDestination(origin, input.direction, span), screen);

      await driver.sendSwipe(origin.x, origin.y, destination.x, destination.y, GESTURE_DURATION_MS);
      return { tree: await currentTree(driver) };
    },

    open_app: async (params, { driver, timing }) => {
      const packageName = resolvePackageName(parseParams(OpenAppParamsSchema, params));

      await launchPackage(driver, packageName);
      await delay(timing.launchSettleMs);

      const foreground = await driver.queryForegroundApp();
      if (foreground !== undefined && foreground !== packageName) {
        throw new ToolError(
          'APP_NOT_FOREGROUND',
          `failed to foreground app '${packageName}' (current foreground package: '${foreground}')`,
          { packageName, foreground }
        );
      }

      return {
        bundle_identifier: packageName,
        package_name: packageName,
        tree: await currentTree(driver),
      };
    },

    set_api_key: async (params, { session }) => {
      const key = parseParams(SetApiKeyParamsSchema, params).api_key.trim();
      if (!key) {
        throw new ValidationError('api_key is required', { parameter: 'api_key' });
      }
      session.apiKey = key;
      return { ok: true };
    },

    submit_prompt: async (_params, { session }) => {
      if (!session.apiKey) {
        throw new ValidationError('No API key found');
      }
      throw new BridgeError(
        'NOT_SUPPORTED',
        'submit_prompt is not yet supported on this bridge; use RPC tool methods directly'
      );
    },

    stop: async (_params, { session }) => {
      session.stopRequested = true;
      return {};
    },
  };
}
