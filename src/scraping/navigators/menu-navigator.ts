/**
 * Menu Navigator
 *
 * Logs in through the certificate-login page and resolves a menu label
 * (e.g. "登録情報検索(IPv4)") to the endpoint serving its form.
 *
 * The login request carries no credentials of its own: the client
 * certificate on the TLS connection is the login, and the portal answers
 * with the session cookie and the top-level menu.
 */
import type { PortalSession, PortalPage } from "../session/portal-session";
import { StructuralError } from "../../shared/errors/portal.errors";
import { logger } from "../../monitoring/logger";

export interface MenuEntry {
  label: string;
  url: string;
}

/**
 * Open the top-level menu page (login happens on the way).
 */
export function openMenu(
  session: PortalSession,
  loginPath: string,
  signal?: AbortSignal
): Promise<PortalPage> {
  return session.getPage(loginPath, signal);
}

/**
 * Find the anchor whose visible text equals the label.
 *
 * @throws StructuralError if the menu has no such entry
 */
export function findMenuEntry(page: PortalPage, label: string): MenuEntry {
  const { $ } = page;
  const anchor = $("a")
    .toArray()
    .map((element) => $(element))
    .find((candidate) => candidate.text().trim() === label);
  const href = anchor?.attr("href");

  if (!anchor || !href) {
    const available = $("a")
      .toArray()
      .map((element) => $(element).text().trim())
      .filter((text) => text.length > 0);
    throw new StructuralError(
      `Menu entry "${label}" not found on ${page.url}; the menu layout changed or the login failed`,
      { label, pageUrl: page.url, available }
    );
  }

  return { label, url: new URL(href, page.url).toString() };
}

/**
 * Log in and resolve a menu label to its endpoint URL.
 *
 * @throws StructuralError if no menu entry carries the label
 * @throws TransportError on network or HTTP failure
 */
export async function resolveMenu(
  session: PortalSession,
  loginPath: string,
  label: string,
  signal?: AbortSignal
): Promise<string> {
  const menu = await openMenu(session, loginPath, signal);
  const entry = findMenuEntry(menu, label);
  logger.debug({ label, url: entry.url }, "Menu entry resolved");
  return entry.url;
}
