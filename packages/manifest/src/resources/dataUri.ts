export interface DataUri {
  readonly mimeType: string;
  readonly data: Uint8Array;
}

export function isDataUri(path: string): boolean {
  return path.startsWith('data:');
}

/**
 * Decode a `data:` URI. Base64 payloads follow `;base64,`; anything else is
 * percent-decoded after the first comma. A bare `data:` yields no bytes.
 */
export function decodeDataUri(uri: string): DataUri | undefined {
  if (!isDataUri(uri)) return undefined;

  const semicolon = uri.indexOf(';');
  const comma = uri.indexOf(',');
  const headerEnd = semicolon >= 0 ? semicolon : comma;
  const mimeType = headerEnd >= 0 ? uri.substring(5, headerEnd) : uri.substring(5);

  const base64Marker = uri.indexOf(';base64,');
  if (base64Marker >= 0) {
    const payload = uri.substring(base64Marker + ';base64,'.length);
    return { mimeType, data: new Uint8Array(Buffer.from(payload, 'base64')) };
  }

  if (comma < 0) return { mimeType, data: new Uint8Array() };

  let text: string;
  try {
    text = decodeURIComponent(uri.substring(comma + 1));
  } catch {
    text = uri.substring(comma + 1);
  }
  return { mimeType, data: new TextEncoder().encode(text) };
}
