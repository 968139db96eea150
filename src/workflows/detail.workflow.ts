/**
 * Detail Workflows
 *
 * Registration detail and contact handle pages. The fetch helpers are also
 * used by the listing traversal, which calls them on an already logged-in
 * session.
 */
import { MENU_LABELS, PORTAL_PATHS } from "../config/constants";
import type { HandleDetail, RegistrationDetail } from "../shared/types/portal.types";
import type { PortalSession } from "../scraping/session/portal-session";
import { resolveMenu } from "../scraping/navigators/menu-navigator";
import { extractRecords } from "../scraping/extractors/table.extractor";
import {
  HANDLE_DETAIL_SCHEMA,
  REGISTRATION_DETAIL_SCHEMA,
  single,
  toHandleDetail,
  toRegistrationDetail,
} from "../scraping/extractors/record-schemas";
import { runWorkflow, type WorkflowDependencies, type WorkflowOptions } from "./workflow-context";

export interface FetchedDetail {
  detail: RegistrationDetail;
  /** URL the detail was served from; its handle links are relative to it */
  pageUrl: string;
}

export async function fetchRegistrationDetail(
  session: PortalSession,
  url: string,
  signal?: AbortSignal
): Promise<FetchedDetail> {
  const page = await session.getPage(url, signal);
  const detail = toRegistrationDetail(single(extractRecords(page.$, REGISTRATION_DETAIL_SCHEMA)));
  return { detail, pageUrl: page.url };
}

export async function fetchHandleDetail(
  session: PortalSession,
  url: string,
  signal?: AbortSignal
): Promise<HandleDetail> {
  const page = await session.getPage(url, signal);
  return toHandleDetail(single(extractRecords(page.$, HANDLE_DETAIL_SCHEMA)));
}

/**
 * Fetch a registration detail page by the link printed in a listing.
 */
export function getRegistrationDetail(
  deps: WorkflowDependencies,
  link: string,
  options: WorkflowOptions = {}
): Promise<RegistrationDetail> {
  return runWorkflow("getRegistrationDetail", deps, options, async (ctx) => {
    const { session, signal } = ctx;
    await resolveMenu(session, deps.loginPath, MENU_LABELS.HANDLE_SEARCH, signal);
    const { detail } = await fetchRegistrationDetail(session, session.resolveUrl(link), signal);
    ctx.log.debug({ link, ipAddress: detail.ipAddress }, "Registration detail extracted");
    return detail;
  });
}

/**
 * Fetch a person or group handle. The handle page only answers once the
 * registration search menu has been opened in the session.
 */
export function getHandleDetail(
  deps: WorkflowDependencies,
  handle: string,
  options: WorkflowOptions = {}
): Promise<HandleDetail> {
  return runWorkflow("getHandleDetail", deps, options, async (ctx) => {
    const { session, signal } = ctx;
    const menuUrl = await resolveMenu(session, deps.loginPath, MENU_LABELS.SEARCH_IPV6, signal);
    await session.getPage(menuUrl, signal);

    const url = session.resolveUrl(
      `${PORTAL_PATHS.HANDLE_DETAIL}?jpnic_hdl=${encodeURIComponent(handle)}`
    );
    const detail = await fetchHandleDetail(session, url, signal);
    ctx.log.debug({ handle, isPersonHandle: detail.isPersonHandle }, "Handle detail extracted");
    return detail;
  });
}
