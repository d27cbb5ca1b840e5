// ============================================================
// Vision Analyzer - Base64 Utilities
// ============================================================

/**
 * Encode raw image bytes as a Base64 string (no data: prefix)
 */
export function encodeImage(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Create a data URL from Base64 image data
 */
export function toDataURL(base64: string, mimeType: string = 'image/jpeg'): string {
  return `data:${mimeType};base64,${base64}`;
}
