/**
 * Form Token Extractor
 *
 * Picks the form for the current workflow step out of a fetched page and
 * collects the hidden control fields (Struts token, destdisp, aplyid,
 * prevDispId, ...) the portal needs to accept the next submission.
 *
 * A page without the expected form is the main sign that the portal
 * answered with something else: an error page, an expired session or a
 * validation failure.
 */
import * as cheerio from "cheerio";
import { FormNotFoundError, StructuralError } from "../../shared/errors/portal.errors";

export type ActionPredicate = (action: string) => boolean;

/** Matches any form */
export const anyAction: ActionPredicate = () => true;

/** Matches forms whose action contains the fragment */
export function actionContains(fragment: string): ActionPredicate {
  const predicate: ActionPredicate = (action) => action.includes(fragment);
  return predicate;
}

export class FormSeed {
  constructor(
    /** Absolute submit URL */
    public readonly action: string,
    /** Hidden fields in document order */
    public readonly fields: ReadonlyMap<string, string>
  ) {}

  get(name: string): string | undefined {
    return this.fields.get(name);
  }

  /**
   * @throws StructuralError if the page carried no such hidden field
   */
  require(name: string): string {
    const value = this.fields.get(name);
    if (value === undefined) {
      throw new StructuralError(`Hidden field ${name} missing from form ${this.action}`, {
        action: this.action,
        field: name,
        present: Array.from(this.fields.keys()),
      });
    }
    return value;
  }
}

/**
 * Select the first form whose action satisfies the predicate and collect
 * its hidden inputs. Hidden inputs outside the form fill in names the form
 * itself does not carry; the portal sometimes renders tokens there.
 *
 * @param $ - Parsed page
 * @param predicate - Which form to take
 * @param pageUrl - URL of the page, used to resolve the action
 * @param expected - Description of the predicate for the error message
 * @throws FormNotFoundError if no form matches
 */
export function extractForm(
  $: cheerio.CheerioAPI,
  predicate: ActionPredicate,
  pageUrl: string,
  expected: string = "any action"
): FormSeed {
  const form = $("form")
    .toArray()
    .map((element) => $(element))
    .find((candidate) => {
      const action = candidate.attr("action");
      return action !== undefined && predicate(action);
    });

  if (!form) {
    throw new FormNotFoundError(pageUrl, expected);
  }

  const fields = new Map<string, string>();
  for (const element of [...form.find("input").toArray(), ...$("input").toArray()]) {
    const input = $(element);
    const type = (input.attr("type") ?? "").toLowerCase();
    const name = input.attr("name");
    const value = input.attr("value");
    if (type === "hidden" && name !== undefined && value !== undefined && !fields.has(name)) {
      fields.set(name, value);
    }
  }

  const action = new URL(form.attr("action") ?? "", pageUrl).toString();
  return new FormSeed(action, fields);
}

/**
 * Read the pre-filled value of a named input anywhere on the page,
 * e.g. the operator's own resource manager short name.
 */
export function extractInputValue($: cheerio.CheerioAPI, name: string): string | undefined {
  const input = $("input")
    .toArray()
    .map((element) => $(element))
    .find((candidate) => candidate.attr("name") === name);
  return input?.attr("value");
}
