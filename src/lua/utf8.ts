/**
 * Lua strings as UTF-8 bytes
 *
 * Lua values are held as JS strings. The byte-mode `string` library sees
 * them as their UTF-8 encoding. A byte that is not part of a valid sequence
 * is held as the lone surrogate U+DC00 + byte. Decoding then encoding gives
 * back the same bytes.
 *
 * @module lua/utf8
 */

const BYTE_ESCAPE = 0xdc00;

function isByteEscape(unit: number): boolean {
  return unit >= 0xdc80 && unit <= 0xdcff;
}

/** Code point starting at `i`, and how many code units it takes */
function codePointAt(text: string, i: number): [number, number] {
  const unit = text.charCodeAt(i);
  if (unit >= 0xd800 && unit <= 0xdbff) {
    const next = text.charCodeAt(i + 1);
    if (next >= 0xdc00 && next <= 0xdfff) return [0x10000 + ((unit - 0xd800) << 10) + (next - 0xdc00), 2];
  }
  return [unit, 1];
}

/**
 * UTF-8 bytes of a string
 *
 * @example
 * utf8Encode('ä') // [0xc3, 0xa4]
 */
export function utf8Encode(text: string): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; ) {
    const [c, units] = codePointAt(text, i);
    i += units;
    if (c < 0x80) bytes.push(c);
    else if (units === 1 && isByteEscape(c)) bytes.push(c - BYTE_ESCAPE);
    else if (c < 0x800) bytes.push(0xc0 | (c >> 6), 0x80 | (c & 0x3f));
    else if (c < 0x10000) bytes.push(0xe0 | (c >> 12), 0x80 | ((c >> 6) & 0x3f), 0x80 | (c & 0x3f));
    else bytes.push(0xf0 | (c >> 18), 0x80 | ((c >> 12) & 0x3f), 0x80 | ((c >> 6) & 0x3f), 0x80 | (c & 0x3f));
  }
  return bytes;
}

/**
 * Number of UTF-8 bytes in a string
 */
export function utf8Length(text: string): number {
  let length = 0;
  for (let i = 0; i < text.length; ) {
    const [c, units] = codePointAt(text, i);
    i += units;
    if (c < 0x80 || (units === 1 && isByteEscape(c))) length += 1;
    else if (c < 0x800) length += 2;
    else if (c < 0x10000) length += 3;
    else length += 4;
  }
  return length;
}

/** Length of the sequence a lead byte opens, 0 for a byte that opens none */
function sequenceLength(lead: number): number {
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

/**
 * String of a run of UTF-8 bytes
 */
export function utf8Decode(bytes: readonly number[], start = 0, end = bytes.length): string {
  let out = '';
  let points: number[] = [];
  let i = start;
  while (i < end) {
    const lead = bytes[i] ?? 0;
    if (lead < 0x80) {
      points.push(lead);
      i++;
    } else {
      const length = sequenceLength(lead);
      let c = lead & (0xff >> (length + 1));
      let valid = length > 0 && i + length <= end;
      for (let k = 1; valid && k < length; k++) {
        const next = bytes[i + k] ?? 0;
        if ((next & 0xc0) !== 0x80) valid = false;
        c = (c << 6) | (next & 0x3f);
      }
      // Overlong forms and surrogates are not characters
      if (length === 3 && (c < 0x800 || (c >= 0xd800 && c <= 0xdfff))) valid = false;
      if (length === 4 && (c < 0x10000 || c > 0x10ffff)) valid = false;
      if (valid) {
        points.push(c);
        i += length;
      } else {
        points.push(BYTE_ESCAPE + lead);
        i++;
      }
    }
    if (points.length >= 4096) {
      out += String.fromCodePoint(...points);
      points = [];
    }
  }
  return out + String.fromCodePoint(...points);
}

/**
 * Join escaped bytes that form valid sequences, e.g. after two halves of
 * one character were concatenated
 */
export function mergeBytes(text: string): string {
  return /[\udc80-\udcff]/.test(text) ? utf8Decode(utf8Encode(text)) : text;
}

/**
 * Concatenate two Lua strings
 */
export function concatBytes(left: string, right: string): string {
  const joined = left + right;
  if (left.length === 0 || right.length === 0) return joined;
  return isByteEscape(left.charCodeAt(left.length - 1)) && isByteEscape(right.charCodeAt(0))
    ? mergeBytes(joined)
    : joined;
}

/**
 * One raw byte as a Lua string
 */
export function byteChar(byte: number): string {
  return byte < 0x80 ? String.fromCharCode(byte) : String.fromCharCode(BYTE_ESCAPE + byte);
}
