import { z } from 'zod';

// Wire protocol
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type RequestId = string | number | boolean | null;

export interface RpcRequest {
  id: RequestId;
  method: string;
  params: JsonObject;
}

export interface RpcSuccessResponse {
  id: RequestId;
  result: JsonValue;
}

export interface RpcErrorResponse {
  id: RequestId;
  error: { message: string };
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

// Geometry and UI hierarchy
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface UiNode {
  tag: 'node';
  className: string;
  label: string;
  description: string;
  identifier: string;
  frame?: Rect;
  clickable: boolean;
  children: UiNode[];
}

export const KEYCODE_ENTER = 66;

export interface ScreenSize {
  width: number;
  height: number;
}

export interface AndroidDevice {
  id: string;
  status: 'device' | 'offline' | 'unauthorized' | 'unknown';
  model?: string;
  product?: string;
  transportId?: string;
  usb?: string;
  productString?: string;
}

export type LaunchTarget =
  | { kind: 'component'; component: string }
  | { kind: 'package'; packageName: string };

export interface LaunchOutcome {
  ok: boolean;
  output: string;
}

/**
 * Operations the dispatcher needs from the OS-level automation tool. Every call may
 * reject with a ToolError; callers never see tool-specific error shapes.
 */
export interface DeviceDriver {
  readonly platform: string;
  readonly serial: string;
  captureHierarchy(): Promise<string>;
  captureScreenImage(): Promise<Buffer>;
  sendTap(x: number, y: number): Promise<void>;
  sendSwipe(x1: number, y1: number, x2: number, y2: number, durationMs: number): Promise<void>;
  sendText(text: string): Promise<void>;
  sendKeyEvent(code: number): Promise<void>;
  queryScreenSize(): Promise<ScreenSize>;
  queryForegroundApp(): Promise<string | undefined>;
  resolveLaunchTarget(packageName: string): Promise<string | undefined>;
  launch(target: LaunchTarget): Promise<LaunchOutcome>;
}

// Error handling
export interface BridgeErrorInfo {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string;
}

export class BridgeError extends Error implements BridgeErrorInfo {
  code: string;
  details?: unknown;
  suggestion?: string;

  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class FramingError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super('FRAMING_ERROR', message, details);
    this.name = 'FramingError';
  }
}

export class ValidationError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class UnsupportedMethodError extends ValidationError {
  constructor(method: string) {
    super(`Unsupported command: ${method}`, { method });
    this.name = 'UnsupportedMethodError';
  }
}

export class ToolError extends BridgeError {
  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(code, message, details, suggestion);
    this.name = 'ToolError';
  }
}

export class ADBCommandError extends ToolError {
  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(code, message, details, suggestion);
    this.name = 'ADBCommandError';
  }
}

export class ADBNotFoundError extends ADBCommandError {
  constructor() {
    super(
      'ADB_NOT_FOUND',
      'Android Debug Bridge (ADB) not found',
      null,
      'Set MOBILE_RPC_ADB, pass --adb-binary, or add adb to PATH'
    );
    this.name = 'ADBNotFoundError';
  }
}

export class DeviceNotFoundError extends ADBCommandError {
  constructor(deviceId: string, status?: string) {
    super(
      'DEVICE_NOT_FOUND',
      status
        ? `adb device '${deviceId}' is not ready: ${status}`
        : `Device with ID '${deviceId}' not found`,
      { deviceId, status },
      'Please check if the device is connected and authorized'
    );
    this.name = 'DeviceNotFoundError';
  }
}

export class NoDevicesFoundError extends ADBCommandError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      'No adb devices found',
      null,
      'Start an emulator or connect a device, then retry'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export class MultipleDevicesFoundError extends ADBCommandError {
  constructor(deviceIds: string[]) {
    super(
      'MULTIPLE_DEVICES_FOUND',
      `Multiple adb devices found (${deviceIds.join(', ')})`,
      { deviceIds },
      'Re-run with --serial'
    );
    this.name = 'MultipleDevicesFoundError';
  }
}

export class ScreenshotCaptureError extends ADBCommandError {
  constructor(deviceId: string, reason: string) {
    super(
      'SCREENSHOT_CAPTURE_FAILED',
      reason,
      { deviceId },
      'Please ensure the device is connected and screen is unlocked'
    );
    this.name = 'ScreenshotCaptureError';
  }
}

export class TransportError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super('TRANSPORT_ERROR', message, details);
    this.name = 'TransportError';
  }
}

export class InternalError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super('INTERNAL_ERROR', message, details);
    this.name = 'InternalError';
  }
}

// Method parameter schemas
const numberParam = z.union(
  [
    z.number().finite(),
    z
      .string()
      .trim()
      .regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/, 'must be a number')
      .transform(value => Number(value))
      // '1e400' matches the pattern but overflows to Infinity
      .refine(value => Number.isFinite(value), { message: 'must be a number' }),
  ],
  { errorMap: () => ({ message: 'must be a number' }) }
);

const stringParam = z.string({ invalid_type_error: 'must be a string' });

const booleanParam = z.boolean({ invalid_type_error: 'must be a boolean' });

export const TapParamsSchema = z.object({
  x: numberParam,
  y: numberParam,
});

export const TapElementParamsSchema = z.object({
  coordinate: stringParam,
  count: numberParam
    .transform(value => Math.trunc(value))
    .refine(value => value >= 1, { message: 'must be >= 1' })
    .default(1),
  longPress: booleanParam.default(false),
});

export const EnterTextParamsSchema = z.object({
  coordinate: stringParam,
  text: stringParam,
  submit: booleanParam.default(true),
});

export const ScrollParamsSchema = z.object({
  x: numberParam,
  y: numberParam,
  distanceX: numberParam,
  distanceY: numberParam,
});

export const SWIPE_DIRECTIONS = ['up', 'down', 'left', 'right'] as const;

export type SwipeDirection = (typeof SWIPE_DIRECTIONS)[number];

export const SwipeParamsSchema = z.object({
  x: numberParam,
  y: numberParam,
  direction: stringParam.transform(value => value.trim().toLowerCase()),
});

export const OpenAppParamsSchema = z.object({
  bundle_identifier: z.unknown().optional(),
  package_name: z.unknown().optional(),
});

export const SetApiKeyParamsSchema = z.object({
  api_key: stringParam,
});
