/**
 * Hex + ASCII rendering of channel traffic for debug logs.
 *
 * Format: space-separated lowercase hex bytes, two spaces, a pipe, then the
 * printable ASCII view with `.` for anything outside 0x20-0x7e.
 */

/** Printable ASCII range used in the right-hand column. */
const PRINTABLE_MIN = 0x20;
const PRINTABLE_MAX = 0x7e;

/**
 * Render bytes as `"41 54 0d 0a  | AT.."`.
 *
 * @param data - Bytes to render.
 */
export function format_hex_ascii(data: Uint8Array): string {
  const hex: string[] = [];
  let ascii = '';
  for (const byte of data) {
    hex.push(byte.toString(16).padStart(2, '0'));
    ascii += byte >= PRINTABLE_MIN && byte <= PRINTABLE_MAX ? String.fromCharCode(byte) : '.';
  }
  return `${hex.join(' ')}  | ${ascii}`;
}

/**
 * Parse user-entered hex ("41 54 0D0A") into bytes.
 *
 * Whitespace is ignored. Returns `null` for odd digit counts or non-hex
 * characters.
 */
export function parse_hex(text: string): Uint8Array | null {
  const digits = text.replace(/\s+/g, '');
  if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) {
    return null;
  }
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(digits.substring(i * 2, i * 2 + 2), 16);
  }
  return out;
}
