/**
 * Listing Traversal
 *
 * Follows each listing row to its registration detail and from there to the
 * contact handles, one request at a time under the rate limiter. Each handle
 * is fetched at most once per traversal; handles the caller already holds
 * are never fetched.
 *
 * The cache is consulted crosswise: the admin link is fetched when the TECH
 * handle is unseen and then the tech handle is marked, and vice versa. Rows
 * whose admin and tech handles differ can therefore fetch a handle twice or
 * skip one.
 *
 * A failed sub-fetch is logged and skipped; the row stays in the listing
 * without the missing piece. Cancellation still ends the whole workflow.
 */
import type { HandleDetail, RegistrationDetail } from "../shared/types/portal.types";
import { WorkflowCancelledError } from "../shared/errors/portal.errors";
import { LinkResolutionCache } from "../scraping/traversal/link-resolution-cache";
import type { RateLimiter } from "../scraping/traversal/rate-limiter";
import { metrics } from "../monitoring/metrics.collector";
import { fetchHandleDetail, fetchRegistrationDetail } from "./detail.workflow";
import type { WorkflowContext } from "./workflow-context";

export interface TraversableRecord {
  detailLink: string;
  detail?: RegistrationDetail;
}

/**
 * Attach details to the records in place and return the fetched handles.
 *
 * @param listingUrl - URL of the listing page; row links are relative to it
 */
export async function traverseListing(
  ctx: WorkflowContext,
  records: TraversableRecord[],
  listingUrl: string,
  knownHandles: readonly string[]
): Promise<HandleDetail[]> {
  const { session, signal } = ctx;
  const cache = new LinkResolutionCache(knownHandles);
  const limiter = ctx.deps.createRateLimiter();
  const handles: HandleDetail[] = [];

  for (const record of records) {
    const fetched = await subFetch(ctx, limiter, "detail", record.detailLink, () =>
      fetchRegistrationDetail(session, session.resolveUrl(record.detailLink, listingUrl), signal)
    );
    if (!fetched) continue;

    const { detail, pageUrl } = fetched;
    record.detail = detail;

    if (cache.shouldFetch(detail.techHandle)) {
      const admin = await subFetch(ctx, limiter, "adminHandle", detail.adminHandleLink, () =>
        fetchHandleDetail(session, session.resolveUrl(detail.adminHandleLink, pageUrl), signal)
      );
      if (admin) {
        handles.push(admin);
        cache.markFetched(detail.techHandle);
      }
    }

    if (cache.shouldFetch(detail.adminHandle)) {
      const tech = await subFetch(ctx, limiter, "techHandle", detail.techHandleLink, () =>
        fetchHandleDetail(session, session.resolveUrl(detail.techHandleLink, pageUrl), signal)
      );
      if (tech) {
        handles.push(tech);
        cache.markFetched(detail.adminHandle);
      }
    }
  }

  ctx.log.info(
    { rows: records.length, handlesFetched: handles.length },
    "Listing traversal finished"
  );
  return handles;
}

async function subFetch<T>(
  ctx: WorkflowContext,
  limiter: RateLimiter,
  kind: string,
  link: string,
  fetch: () => Promise<T>
): Promise<T | undefined> {
  if (!link) {
    ctx.log.debug({ kind }, "No link to follow");
    return undefined;
  }

  await limiter.waitTurn(ctx.signal);
  try {
    return await fetch();
  } catch (error) {
    if (error instanceof WorkflowCancelledError) {
      throw error;
    }
    metrics.increment("portal_subfetch_failures_total", { kind });
    ctx.log.warn({ kind, link, error: (error as Error).message }, "Sub-fetch failed, skipping");
    return undefined;
  }
}
