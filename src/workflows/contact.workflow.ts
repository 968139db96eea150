/**
 * Contact Change Workflow
 *
 * Two-phase registration/change of a person or group handle:
 * 1. Fill the registration form (action contains "regist.do") and apply
 * 2. The portal answers with a confirmation page when it accepted the input,
 *    or re-renders the form with the problem in red
 * 3. Confirm through the "apply" form
 * 4. Read the receipt number from the completion page
 */
import {
  ACTION_CAPTIONS,
  FORM_ACTIONS,
  FORM_FIELDS,
  MENU_LABELS,
} from "../config/constants";
import type { ContactChangeInput } from "../shared/types/portal.types";
import { ApplicationError, StructuralError } from "../shared/errors/portal.errors";
import { resolveMenu } from "../scraping/navigators/menu-navigator";
import { actionContains, extractForm, type FormSeed } from "../scraping/navigators/form-token-extractor";
import { FormSubmission } from "../scraping/navigators/form-submission";
import {
  extractHighlightedError,
  extractReceiptNumber,
  hasConfirmationPrompt,
} from "../scraping/extractors/confirmation.extractor";
import { runWorkflow, type WorkflowDependencies, type WorkflowOptions } from "./workflow-context";

export function buildContactSubmission(input: ContactChangeInput, seed: FormSeed): FormSubmission {
  return new FormSubmission()
    .set(FORM_FIELDS.TOKEN, seed.require(FORM_FIELDS.TOKEN))
    .set(FORM_FIELDS.DEST_DISP, seed.require(FORM_FIELDS.DEST_DISP))
    .set(FORM_FIELDS.APPLY_ID, seed.require(FORM_FIELDS.APPLY_ID))
    .set("kind", input.isPersonHandle ? "person" : "group")
    .set("jpnic_hdl", input.handle)
    .set("name_jp", input.name)
    .set("name", input.nameEn)
    .set("email", input.email)
    .set("org_nm_jp", input.org)
    .set("org_nm", input.orgEn)
    .set("zipcode", input.zipCode)
    .set("addr_jp", input.address)
    .set("addr", input.addressEn)
    .set("division_jp", input.division)
    .set("division", input.divisionEn)
    .set("title_jp", input.title)
    .set("title", input.titleEn)
    .set("phone", input.tel)
    .set("fax", input.fax)
    .set("ntfy_mail", input.notifyMail)
    .set("aply_from_addr", input.applyMail)
    .set("aply_from_addr_confirm", input.applyMail)
    .set("action", ACTION_CAPTIONS.APPLY_ENCODED);
}

export function buildConfirmSubmission(seed: FormSeed): FormSubmission {
  return new FormSubmission()
    .set(FORM_FIELDS.TOKEN, seed.require(FORM_FIELDS.TOKEN))
    .set(FORM_FIELDS.PREV_DISP_ID, seed.require(FORM_FIELDS.PREV_DISP_ID))
    .set(FORM_FIELDS.APPLY_ID, seed.require(FORM_FIELDS.APPLY_ID))
    .set(FORM_FIELDS.DEST_DISP, seed.require(FORM_FIELDS.DEST_DISP))
    .set("inputconf", ACTION_CAPTIONS.CONFIRM_ENCODED);
}

/**
 * Register or change a contact. Returns the receipt number.
 *
 * @throws ApplicationError when the portal rejects the input (red error text)
 * @throws StructuralError when a form, token or the receipt number is missing
 */
export function changeContactInfo(
  deps: WorkflowDependencies,
  input: ContactChangeInput,
  options: WorkflowOptions = {}
): Promise<string> {
  return runWorkflow("changeContactInfo", deps, options, async (ctx) => {
    const { session, signal, log } = ctx;

    const menuUrl = await resolveMenu(session, deps.loginPath, MENU_LABELS.CONTACT_CHANGE, signal);
    const formPage = await session.getPage(menuUrl, signal);
    const registerForm = extractForm(
      formPage.$,
      actionContains(FORM_ACTIONS.REGISTER),
      formPage.url,
      `"${FORM_ACTIONS.REGISTER}"`
    );

    const confirmPage = await session.submitForm(
      registerForm.action,
      buildContactSubmission(input, registerForm),
      signal
    );

    if (!hasConfirmationPrompt(confirmPage)) {
      const message = extractHighlightedError(confirmPage);
      if (message !== undefined) {
        log.warn({ handle: input.handle, message }, "Portal rejected contact change");
        throw new ApplicationError([message]);
      }
      throw new StructuralError(
        `Contact change was not confirmed and ${confirmPage.url} shows no error text`,
        { pageUrl: confirmPage.url }
      );
    }

    const applyForm = extractForm(
      confirmPage.$,
      actionContains(FORM_ACTIONS.APPLY),
      confirmPage.url,
      `"${FORM_ACTIONS.APPLY}"`
    );
    const donePage = await session.submitForm(
      applyForm.action,
      buildConfirmSubmission(applyForm),
      signal
    );

    const recepNo = extractReceiptNumber(donePage);
    if (!recepNo) {
      throw new StructuralError(`No receipt number on ${donePage.url}`, { pageUrl: donePage.url });
    }

    log.info({ handle: input.handle, recepNo }, "Contact change applied");
    return recepNo;
  });
}
