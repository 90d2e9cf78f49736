import type { DecodedImage, ImageProvider } from '../interfaces/ImageProvider';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const ICO_SIGNATURE = [0x00, 0x00, 0x01, 0x00];

/**
 * Recognizes common image formats by their leading bytes. Dimensions are read
 * for PNG and GIF; other formats report only their type. SVG is accepted when
 * the hint says so or the text opens with an `<svg` element.
 */
export class SignatureImageProvider implements ImageProvider {
  decode(bytes: Uint8Array, hint: string): DecodedImage | undefined {
    const byteLength = bytes.byteLength;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    if (startsWith(bytes, PNG_SIGNATURE) && byteLength >= 24) {
      return { mimeType: 'image/png', byteLength, width: view.getUint32(16), height: view.getUint32(20) };
    }

    if (ascii(bytes, 0, 4) === 'GIF8' && byteLength >= 10) {
      return { mimeType: 'image/gif', byteLength, width: view.getUint16(6, true), height: view.getUint16(8, true) };
    }

    if (startsWith(bytes, JPEG_SIGNATURE)) return { mimeType: 'image/jpeg', byteLength };
    if (ascii(bytes, 0, 4) === 'RIFF' && ascii(bytes, 8, 12) === 'WEBP') return { mimeType: 'image/webp', byteLength };
    if (startsWith(bytes, ICO_SIGNATURE)) return { mimeType: 'image/x-icon', byteLength };

    if (isSvgHint(hint) || /^\s*(<\?xml[^>]*>\s*)?<svg[\s>]/i.test(new TextDecoder().decode(bytes.subarray(0, 512)))) {
      return { mimeType: 'image/svg+xml', byteLength };
    }

    return undefined;
  }
}

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  return bytes.length >= signature.length && signature.every((byte, index) => bytes[index] === byte);
}

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return String.fromCharCode(...bytes.subarray(start, end));
}

function isSvgHint(hint: string): boolean {
  const normalized = hint.toLowerCase();
  return normalized === 'svg' || normalized === 'image/svg+xml';
}
