/**
 * Encoding Bridge
 *
 * Converts between native strings and the portal's Shift_JIS bytes.
 * Every outbound form body and every inbound page or control response
 * passes through here exactly once.
 *
 * iconv-lite substitutes "?" (encode) or U+FFFD (decode) for anything it
 * cannot map. The portal would accept a substituted body with corrupted
 * field values, so both directions check the result and fail instead.
 *
 * The decoder reads the user-defined area (lead bytes F0..F9) as Private Use
 * Area characters but its encoder has no way back; toLegacy maps those
 * characters itself so that decoded text always encodes again.
 */
import * as iconv from "iconv-lite";
import { EncodingError } from "../../shared/errors/portal.errors";

export const PORTAL_ENCODING = "Shift_JIS";

const REPLACEMENT_CHAR = "\uFFFD";
const PRIVATE_USE = /([\uE000-\uF8FF])/;

/** Lead bytes of two-byte Shift_JIS codes */
const LEAD_BYTE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x81, 0x9f],
  [0xe0, 0xfc],
];

let privateUseBytes: Map<string, Buffer> | undefined;

/**
 * Encode native text to Shift_JIS.
 * Private Use Area characters go back to the user-defined codes they were
 * decoded from.
 *
 * @throws EncodingError naming the first character outside the repertoire
 */
export function toLegacy(text: string): Buffer {
  if (!PRIVATE_USE.test(text)) {
    return encodeStandard(text, 0);
  }

  const chunks: Buffer[] = [];
  let offset = 0;
  for (const part of text.split(PRIVATE_USE)) {
    if (part.length === 1 && PRIVATE_USE.test(part)) {
      const bytes = privateUseCharacters().get(part);
      if (!bytes) {
        throw unmappable(part, offset);
      }
      chunks.push(bytes);
    } else if (part) {
      chunks.push(encodeStandard(part, offset));
    }
    offset += part.length;
  }
  return Buffer.concat(chunks);
}

/**
 * Decode Shift_JIS bytes to native text.
 *
 * @throws EncodingError if any byte sequence is undecodable
 */
export function fromLegacy(bytes: Buffer): string {
  const text = iconv.decode(bytes, PORTAL_ENCODING);
  const offset = text.indexOf(REPLACEMENT_CHAR);
  if (offset !== -1) {
    throw new EncodingError(
      `Undecodable ${PORTAL_ENCODING} sequence near character offset ${offset}`
    );
  }
  return text;
}

/** Whether every character of the text survives a round trip */
export function isRepresentable(text: string): boolean {
  try {
    toLegacy(text);
    return true;
  } catch (error) {
    if (error instanceof EncodingError) return false;
    throw error;
  }
}

function encodeStandard(text: string, baseOffset: number): Buffer {
  const bytes = iconv.encode(text, PORTAL_ENCODING);
  if (iconv.decode(bytes, PORTAL_ENCODING) === text) {
    return bytes;
  }

  let offset = baseOffset;
  for (const char of text) {
    if (!roundTrips(char)) {
      throw unmappable(char, offset);
    }
    offset += char.length;
  }
  throw new EncodingError(`Text does not round-trip through ${PORTAL_ENCODING}`);
}

function roundTrips(text: string): boolean {
  return iconv.decode(iconv.encode(text, PORTAL_ENCODING), PORTAL_ENCODING) === text;
}

function unmappable(char: string, offset: number): EncodingError {
  const codePoint = (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
  return new EncodingError(
    `Character "${char}" (U+${codePoint}) at offset ${offset} has no ${PORTAL_ENCODING} mapping`
  );
}

/**
 * Private Use Area characters the decoder produces, keyed to the first
 * two-byte code that decodes to each. Built on first use.
 */
function privateUseCharacters(): Map<string, Buffer> {
  if (privateUseBytes) {
    return privateUseBytes;
  }

  const table = new Map<string, Buffer>();
  for (const [first, last] of LEAD_BYTE_RANGES) {
    for (let lead = first; lead <= last; lead++) {
      for (let trail = 0x40; trail <= 0xfc; trail++) {
        if (trail === 0x7f) continue;
        const bytes = Buffer.from([lead, trail]);
        const char = iconv.decode(bytes, PORTAL_ENCODING);
        if (char.length === 1 && PRIVATE_USE.test(char) && !table.has(char)) {
          table.set(char, bytes);
        }
      }
    }
  }

  privateUseBytes = table;
  return table;
}
