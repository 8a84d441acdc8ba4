const textEncoder = new TextEncoder();
const maybeBuffer = (
  globalThis as typeof globalThis & {
    Buffer?: {
      from(data: Uint8Array | string, encoding?: string): { toString(encoding?: string): string };
    };
  }
).Buffer;

export function encodeUtf8(value: string): Uint8Array {
  return textEncoder.encode(value);
}

export function encodeBase64(bytes: Uint8Array): string {
  if (maybeBuffer) {
    return maybeBuffer.from(bytes).toString('base64');
  }
  let binary = '';
  for (let i = 0; i < bytes.length; i += 1) {
    const byte = bytes[i];
    if (byte === undefined) {
      continue;
    }
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

/**
 * Percent-decodes a value, returning it unchanged when it is not valid
 * percent-encoding.
 */
export function decodePercent(value: string): string {
  if (!value.includes('%')) {
    return value;
  }
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
