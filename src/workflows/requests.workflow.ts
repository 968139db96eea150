/**
 * Request List Workflow
 *
 * Lists applications starting at a receipt number. The search form takes a
 * fixed set of fields; only the start receipt number is filled in.
 */
import { ACTION_CAPTIONS, FORM_FIELDS, MENU_LABELS } from "../config/constants";
import type { RequestEntry } from "../shared/types/portal.types";
import { resolveMenu } from "../scraping/navigators/menu-navigator";
import { anyAction, extractForm } from "../scraping/navigators/form-token-extractor";
import { FormSubmission } from "../scraping/navigators/form-submission";
import { extractRecords } from "../scraping/extractors/table.extractor";
import { REQUEST_LIST_SCHEMA, toRequestEntry } from "../scraping/extractors/record-schemas";
import { runWorkflow, type WorkflowDependencies, type WorkflowOptions } from "./workflow-context";

export function buildRequestListSubmission(destDisp: string, recepNo: string): FormSubmission {
  return new FormSubmission()
    .set(FORM_FIELDS.DEST_DISP, destDisp)
    .set("startRecepNo", recepNo)
    .set("endRecepNo", "")
    .set("deliNo", "")
    .set("aplyKind", "")
    .set("aplyClass", "")
    .set("resceAdmSnm", "")
    .set("aplyDateS", "")
    .set("aplyDateE", "")
    .set("completDateS", "")
    .set("completDateE", "")
    .set("statusId", "")
    .set("pswdResceNewConfirm", ACTION_CAPTIONS.SEARCH_ENCODED);
}

export function listRequests(
  deps: WorkflowDependencies,
  recepNo: string,
  options: WorkflowOptions = {}
): Promise<RequestEntry[]> {
  return runWorkflow("listRequests", deps, options, async (ctx) => {
    const { session, signal } = ctx;
    const menuUrl = await resolveMenu(session, deps.loginPath, MENU_LABELS.REQUEST_LIST, signal);
    const formPage = await session.getPage(menuUrl, signal);
    const seed = extractForm(formPage.$, anyAction, formPage.url, "the request search form");

    const page = await session.submitForm(
      seed.action,
      buildRequestListSubmission(seed.require(FORM_FIELDS.DEST_DISP), recepNo),
      signal
    );

    const entries = Array.from(extractRecords(page.$, REQUEST_LIST_SCHEMA), toRequestEntry);
    ctx.log.info({ recepNo, entries: entries.length }, "Request list extracted");
    return entries;
  });
}
