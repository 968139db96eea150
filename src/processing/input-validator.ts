/**
 * Input Validator
 *
 * Validates workflow inputs against Joi schemas before any request is made.
 * Missing optional fields are filled with their defaults (empty string or
 * false), unknown keys are rejected, and no value may contain a line break:
 * form bodies and transaction fields are written unescaped. Values that go
 * into a form body may not hold `&`, `=` or `%` either, since those would
 * start another field or read as an escape.
 */
import Joi from "joi";
import type {
  ContactChangeInput,
  Ipv4SearchCriteria,
  Ipv6SearchCriteria,
  WebTransaction,
} from "../shared/types/portal.types";
import { InputValidationError } from "../shared/errors/portal.errors";
import { logger } from "../monitoring/logger";

const SINGLE_LINE = /^[^\r\n]*$/;
const NO_FORM_DELIMITERS = /^[^&=%]*$/;

const textMessages = {
  "string.pattern.base": "{{#label}} must not contain line breaks",
  "string.pattern.name": "{{#label}} must not contain &, = or %",
};

function singleLine(): Joi.StringSchema {
  return Joi.string().allow("").pattern(SINGLE_LINE).messages(textMessages).default("");
}

/** A value written into a form body */
function text(): Joi.StringSchema {
  return singleLine().pattern(NO_FORM_DELIMITERS, { name: "form-safe" });
}

function flag(): Joi.BooleanSchema {
  return Joi.boolean().default(false);
}

function mail(): Joi.StringSchema {
  return text().email({ tlds: { allow: false } });
}

const ipv6SearchFields = {
  ipAddress: text(),
  sizeStart: text(),
  sizeEnd: text(),
  networkName: text(),
  regStart: text(),
  regEnd: text(),
  returnStart: text(),
  returnEnd: text(),
  org: text(),
  shortName: text(),
  recepNo: text(),
  deliNo: text(),
  isAllocate: flag(),
  isAssignInfra: flag(),
  isAssignUser: flag(),
  isSubAllocate: flag(),
  myself: flag(),
  includeDetail: flag(),
  knownHandles: Joi.array()
    .items(Joi.string().pattern(SINGLE_LINE).messages(textMessages))
    .default(() => []),
};

const ipv6SearchSchema = Joi.object<Ipv6SearchCriteria>(ipv6SearchFields);

const ipv4SearchSchema = Joi.object<Ipv4SearchCriteria>({
  ...ipv6SearchFields,
  isPA: flag(),
  isHistoricalPI: flag(),
  isSpecialPI: flag(),
});

const contactChangeSchema = Joi.object<ContactChangeInput>({
  isPersonHandle: Joi.boolean().required(),
  handle: text(),
  name: text(),
  nameEn: text(),
  email: mail(),
  org: text(),
  orgEn: text(),
  zipCode: text(),
  address: text(),
  addressEn: text(),
  division: text(),
  divisionEn: text(),
  title: text(),
  titleEn: text(),
  tel: text(),
  fax: text(),
  notifyMail: mail(),
  applyMail: Joi.string()
    .pattern(NO_FORM_DELIMITERS, { name: "form-safe" })
    .messages(textMessages)
    .email({ tlds: { allow: false } })
    .required(),
});

const webTransactionSchema = Joi.object<WebTransaction>({
  fields: Joi.array()
    .items(
      Joi.object({
        key: Joi.string().pattern(/^[A-Za-z0-9_]+$/).required(),
        value: singleLine(),
      })
    )
    .min(1)
    .required(),
});

/** Portal-relative path of a detail page, as printed in a listing */
const detailLinkSchema = Joi.string()
  .pattern(/^\/[^\r\n]*$/)
  .required()
  .messages({ "string.pattern.base": "{{#label}} must be a portal path starting with /" })
  .label("link");

const handleSchema = Joi.string()
  .trim()
  .pattern(/^[A-Za-z0-9-]+$/)
  .required()
  .label("handle");

const recepNoSchema = text().label("recepNo");

function validate<T>(schema: Joi.Schema<T>, input: unknown, what: string): T {
  const { error, value } = schema.validate(input, { abortEarly: false });

  if (error) {
    const details = error.details.map((d) => d.message).join("; ");
    logger.warn({ input: what, validationErrors: details }, "Workflow input validation failed");
    throw new InputValidationError(`Invalid ${what}: ${details}`);
  }

  return value;
}

export function validateIpv4Search(input: unknown): Ipv4SearchCriteria {
  return validate(ipv4SearchSchema, input, "IPv4 search criteria");
}

export function validateIpv6Search(input: unknown): Ipv6SearchCriteria {
  return validate(ipv6SearchSchema, input, "IPv6 search criteria");
}

export function validateContactChange(input: unknown): ContactChangeInput {
  return validate(contactChangeSchema, input, "contact change");
}

export function validateWebTransaction(input: unknown): WebTransaction {
  return validate(webTransactionSchema, input, "transaction");
}

export function validateDetailLink(input: unknown): string {
  return validate(detailLinkSchema, input, "detail link");
}

export function validateHandle(input: unknown): string {
  return validate(handleSchema, input, "handle");
}

export function validateRecepNo(input: unknown): string {
  return validate(recepNoSchema, input ?? "", "receipt number");
}
