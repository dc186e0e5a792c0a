import { Point, Rect, ScreenSize, ValidationError } from '../types';

const NUMBER = '([-+]?\\d+(?:\\.\\d+)?)';

const COORDINATE_REGEX = new RegExp(
  `^\\{\\s*\\{\\s*${NUMBER}\\s*,\\s*${NUMBER}\\s*\\}\\s*,\\s*\\{\\s*${NUMBER}\\s*,\\s*${NUMBER}\\s*\\}\\s*\\}$`
);

const BOUNDS_REGEX = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

// Parse an element frame in the `{{x, y}, {w, h}}` form used by RPC params and results.
export function parseRect(coordinate: string): Rect {
  const match = coordinate.trim().match(COORDINATE_REGEX);
  if (!match) {
    throw new ValidationError(
      `coordinate must look like {{x, y}, {w, h}}; got '${coordinate}'`,
      { coordinate }
    );
  }

  return {
    x: parseFloat(match[1]),
    y: parseFloat(match[2]),
    width: parseFloat(match[3]),
    height: parseFloat(match[4]),
  };
}

// toFixed switches to exponent notation from 1e21; numbers that large are whole.
function formatNumber(value: number): string {
  if (!Number.isFinite(value) || Math.abs(value) < 1e21) {
    return value.toFixed(1);
  }
  return `${BigInt(value)}.0`;
}

// Callers hand this string back as an element handle, so the format must stay byte-stable.
export function formatRect(x: number, y: number, width: number, height: number): string {
  return `{{${formatNumber(x)}, ${formatNumber(y)}}, {${formatNumber(width)}, ${formatNumber(height)}}}`;
}

export function formatFrame(rect: Rect): string {
  return formatRect(rect.x, rect.y, rect.width, rect.height);
}

// Parse UiAutomator `[x1,y1][x2,y2]` bounds. Unparseable bounds mean "no frame".
export function parseBounds(bounds: string): Rect | undefined {
  const match = bounds.trim().match(BOUNDS_REGEX);
  if (!match) {
    return undefined;
  }

  const x1 = parseFloat(match[1]);
  const y1 = parseFloat(match[2]);
  const x2 = parseFloat(match[3]);
  const y2 = parseFloat(match[4]);

  return {
    x: x1,
    y: y1,
    width: Math.max(0, x2 - x1),
    height: Math.max(0, y2 - y1),
  };
}

// Nearest integer; exact halves go to the even neighbour.
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function rectCenter(rect: Rect): Point {
  return {
    x: roundHalfEven(rect.x + rect.width / 2),
    y: roundHalfEven(rect.y + rect.height / 2),
  };
}

export function clampToScreen(point: Point, screen: ScreenSize): Point {
  return {
    x: Math.min(Math.max(point.x, 0), screen.width - 1),
    y: Math.min(Math.max(point.y, 0), screen.height - 1),
  };
}
