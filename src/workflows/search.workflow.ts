/**
 * Registration Search Workflows
 *
 * Flow (IPv4 and IPv6 alike):
 * 1. Log in and resolve the search menu entry
 * 2. Fetch the search form and read its destdisp token
 *    (and the operator's own short name when searching "myself")
 * 3. Post the criteria in the portal's fixed field order
 * 4. Extract the listing rows
 * 5. Optionally follow each row to its detail and contact handles
 */
import {
  ACTION_CAPTIONS,
  CHECKBOX,
  FORM_FIELDS,
  MENU_LABELS,
} from "../config/constants";
import type {
  Ipv4Registration,
  Ipv4SearchCriteria,
  Ipv6Registration,
  Ipv6SearchCriteria,
  SearchResult,
} from "../shared/types/portal.types";
import { StructuralError } from "../shared/errors/portal.errors";
import type { PortalPage } from "../scraping/session/portal-session";
import { resolveMenu } from "../scraping/navigators/menu-navigator";
import {
  anyAction,
  extractForm,
  extractInputValue,
  type FormSeed,
} from "../scraping/navigators/form-token-extractor";
import { FormSubmission } from "../scraping/navigators/form-submission";
import { extractRecords } from "../scraping/extractors/table.extractor";
import {
  IPV4_LISTING_SCHEMA,
  IPV6_LISTING_SCHEMA,
  toIpv4Registration,
  toIpv6Registration,
} from "../scraping/extractors/record-schemas";
import { traverseListing, type TraversableRecord } from "./listing-traversal";
import {
  runWorkflow,
  type WorkflowContext,
  type WorkflowDependencies,
  type WorkflowOptions,
} from "./workflow-context";

function checkbox(checked: boolean): string {
  return checked ? CHECKBOX.ON : CHECKBOX.OFF;
}

interface SearchForm {
  seed: FormSeed;
  destDisp: string;
  ownShortName?: string;
}

async function openSearchForm(
  ctx: WorkflowContext,
  label: string,
  myself: boolean
): Promise<SearchForm> {
  const { session, deps, signal } = ctx;
  const menuUrl = await resolveMenu(session, deps.loginPath, label, signal);
  const page = await session.getPage(menuUrl, signal);
  const seed = extractForm(page.$, anyAction, page.url, "the search form");
  const destDisp = seed.require(FORM_FIELDS.DEST_DISP);

  if (!myself) {
    return { seed, destDisp };
  }

  const ownShortName = extractInputValue(page.$, FORM_FIELDS.OWN_SHORT_NAME);
  if (ownShortName === undefined) {
    throw new StructuralError(
      `Own resource manager short name (${FORM_FIELDS.OWN_SHORT_NAME}) not found on ${page.url}`,
      { pageUrl: page.url }
    );
  }
  return { seed, destDisp, ownShortName };
}

/** Fields shared by both searches, up to and including deliNo */
function appendCommonCriteria(
  submission: FormSubmission,
  criteria: Ipv6SearchCriteria,
  shortName: string
): FormSubmission {
  return submission
    .set("ipaddr", criteria.ipAddress)
    .set("sizeS", criteria.sizeStart)
    .set("sizeE", criteria.sizeEnd)
    .set("netwrkName", criteria.networkName)
    .set("regDateS", criteria.regStart)
    .set("regDateE", criteria.regEnd)
    .set("rtnDateS", criteria.returnStart)
    .set("rtnDateE", criteria.returnEnd)
    .set("organizationName", criteria.org)
    .set("resceAdmSnm", shortName)
    .set("recepNo", criteria.recepNo)
    .set("deliNo", criteria.deliNo);
}

export function buildIpv4Submission(
  criteria: Ipv4SearchCriteria,
  form: Pick<SearchForm, "destDisp" | "ownShortName">
): FormSubmission {
  const submission = new FormSubmission().set(FORM_FIELDS.DEST_DISP, form.destDisp);
  const shortName = criteria.myself ? form.ownShortName ?? "" : criteria.shortName;

  return appendCommonCriteria(submission, criteria, shortName)
    .set("ipaddrKindPa", checkbox(criteria.isPA))
    .set("regKindAllo", checkbox(criteria.isAllocate))
    .set("regKindEvent", checkbox(criteria.isAssignInfra))
    .set("regKindUser", checkbox(criteria.isAssignUser))
    .set("regKindSubA", checkbox(criteria.isSubAllocate))
    .set("ipaddrKindPiHistorical", checkbox(criteria.isHistoricalPI))
    .set("ipaddrKindPiSpecial", checkbox(criteria.isSpecialPI))
    .set("action", ACTION_CAPTIONS.SEARCH_LITERAL);
}

/**
 * A "myself" IPv6 search sends blank criteria, the own short name and
 * no kind flags.
 */
export function buildIpv6Submission(
  criteria: Ipv6SearchCriteria,
  form: Pick<SearchForm, "destDisp" | "ownShortName">
): FormSubmission {
  const submission = new FormSubmission().set(FORM_FIELDS.DEST_DISP, form.destDisp);

  if (criteria.myself) {
    const blank: Ipv6SearchCriteria = {
      ...criteria,
      ipAddress: "",
      sizeStart: "",
      sizeEnd: "",
      networkName: "",
      regStart: "",
      regEnd: "",
      returnStart: "",
      returnEnd: "",
      org: "",
      recepNo: "",
      deliNo: "",
    };
    return appendCommonCriteria(submission, blank, form.ownShortName ?? "").set(
      "action",
      ACTION_CAPTIONS.SEARCH_ENCODED
    );
  }

  return appendCommonCriteria(submission, criteria, criteria.shortName)
    .set("regKindAllo", checkbox(criteria.isAllocate))
    .set("regKindEvent", checkbox(criteria.isAssignInfra))
    .set("regKindUser", checkbox(criteria.isAssignUser))
    .set("regKindSubA", checkbox(criteria.isSubAllocate))
    .set("action", ACTION_CAPTIONS.SEARCH_ENCODED);
}

async function finishSearch<T extends TraversableRecord>(
  ctx: WorkflowContext,
  page: PortalPage,
  records: T[],
  criteria: Ipv6SearchCriteria
): Promise<SearchResult<T>> {
  ctx.log.info({ rows: records.length, includeDetail: criteria.includeDetail }, "Listing extracted");

  if (!criteria.includeDetail) {
    return { records, handles: [] };
  }
  const handles = await traverseListing(ctx, records, page.url, criteria.knownHandles);
  return { records, handles };
}

export function searchIpv4(
  deps: WorkflowDependencies,
  criteria: Ipv4SearchCriteria,
  options: WorkflowOptions = {}
): Promise<SearchResult<Ipv4Registration>> {
  return runWorkflow("searchIpv4", deps, options, async (ctx) => {
    const form = await openSearchForm(ctx, MENU_LABELS.SEARCH_IPV4, criteria.myself);
    const page = await ctx.session.submitForm(
      form.seed.action,
      buildIpv4Submission(criteria, form),
      ctx.signal
    );
    const records = Array.from(extractRecords(page.$, IPV4_LISTING_SCHEMA), toIpv4Registration);
    return finishSearch(ctx, page, records, criteria);
  });
}

export function searchIpv6(
  deps: WorkflowDependencies,
  criteria: Ipv6SearchCriteria,
  options: WorkflowOptions = {}
): Promise<SearchResult<Ipv6Registration>> {
  return runWorkflow("searchIpv6", deps, options, async (ctx) => {
    const form = await openSearchForm(ctx, MENU_LABELS.SEARCH_IPV6, criteria.myself);
    const page = await ctx.session.submitForm(
      form.seed.action,
      buildIpv6Submission(criteria, form),
      ctx.signal
    );
    const records = Array.from(extractRecords(page.$, IPV6_LISTING_SCHEMA), toIpv6Registration);
    return finishSearch(ctx, page, records, criteria);
  });
}
