/**
 * Base64 helpers for audio payloads on the wire.
 */

/** btoa takes a binary string; build it in slices to stay under argument limits */
const SLICE_SIZE = 0x8000;

export function bytesToBase64(bytes: Uint8Array): string {
  let binary = "";
  for (let i = 0; i < bytes.length; i += SLICE_SIZE) {
    binary += String.fromCharCode(...bytes.subarray(i, i + SLICE_SIZE));
  }
  return btoa(binary);
}

/**
 * @throws DOMException if `text` is not valid base64
 */
export function base64ToBytes(text: string): Uint8Array {
  const binary = atob(text);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}
