import { JsonObject, ScreenSize } from '../types';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function isPNG(data: Buffer): boolean {
  return data.length >= PNG_SIGNATURE.length && data.subarray(0, 8).equals(PNG_SIGNATURE);
}

// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): ScreenSize | undefined {
  // The first chunk must be IHDR: length at bytes 8-11, type at 12-15,
  // width at 16-19 and height at 20-23 (big-endian)
  if (pngData.length < 24 || !isPNG(pngData)) {
    return undefined;
  }
  if (pngData.toString('ascii', 12, 16) !== 'IHDR') {
    return undefined;
  }

  const width = pngData.readUInt32BE(16);
  const height = pngData.readUInt32BE(20);

  return { width, height };
}

// Convert binary data to base64
export function binaryToBase64(data: Buffer): string {
  return data.toString('base64');
}

export function screenImagePayload(png: Buffer): JsonObject {
  const payload: JsonObject = {
    screenshot_base64: binaryToBase64(png),
  };

  const dimensions = getPNGDimensions(png);
  if (dimensions) {
    payload.metadata = { width: dimensions.width, height: dimensions.height };
  }

  return payload;
}
