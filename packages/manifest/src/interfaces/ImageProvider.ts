export interface DecodedImage {
  readonly mimeType: string;
  readonly byteLength: number;
  readonly width?: number;
  readonly height?: number;
}

export interface ImageProvider {
  /**
   * Decode image bytes. `hint` is a MIME type or a file extension.
   * Returns undefined when the bytes are not an image.
   */
  decode(bytes: Uint8Array, hint: string): DecodedImage | undefined;
}
