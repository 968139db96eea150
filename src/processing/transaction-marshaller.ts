/**
 * Transaction Marshaller
 *
 * Writes a WebTransaction as the transactional endpoint's request text:
 * one `KEY=VALUE` line per field, in the given order, CRLF-terminated.
 * The text is then sent as Shift_JIS.
 */
import type { WebTransaction } from "../shared/types/portal.types";
import { toLegacy } from "../scraping/session/encoding-bridge";

const LINE_END = "\r\n";

export function marshalTransaction(transaction: WebTransaction): string {
  return transaction.fields.map(({ key, value }) => `${key}=${value}${LINE_END}`).join("");
}

/**
 * @throws EncodingError if a value cannot be written in Shift_JIS
 */
export function encodeTransaction(transaction: WebTransaction): Buffer {
  return toLegacy(marshalTransaction(transaction));
}
