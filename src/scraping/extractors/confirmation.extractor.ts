/**
 * Confirmation Extractor
 *
 * Reads the outcome of a two-phase write: whether the portal accepted the
 * input (confirmation phrase present), the red error text it shows when it
 * did not, and the receipt number on the completion page.
 */
import { PAGE_MARKERS } from "../../config/constants";
import type { PortalPage } from "../session/portal-session";

export function hasConfirmationPrompt(page: PortalPage): boolean {
  return page.html.includes(PAGE_MARKERS.CONFIRMATION_PHRASE);
}

/**
 * Text of the last red <font> on the page, if any.
 */
export function extractHighlightedError(page: PortalPage): string | undefined {
  const { $ } = page;
  let message: string | undefined;
  for (const element of $("font").toArray()) {
    const font = $(element);
    if (font.attr("color") !== "red") continue;
    const text = font.text().trim();
    if (text) message = text;
  }
  return message;
}

/**
 * Value of the cell that follows the "受付番号" caption.
 */
export function extractReceiptNumber(page: PortalPage): string | undefined {
  const { $ } = page;
  let recepNo: string | undefined;
  for (const element of $("table table td").toArray()) {
    const cell = $(element);
    if (cell.prev().text().includes(PAGE_MARKERS.RECEIPT_CAPTION)) {
      recepNo = cell.text().trim();
    }
  }
  return recepNo;
}
