/**
 * Custom Error Classes for Portal Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * Workflows throw these to halt; the API layer maps them to HTTP statuses.
 * Nothing in this service retries a failed workflow: `retryable` only tells
 * the caller whether running the whole workflow again could help.
 */
import { ERROR_CODES, type ErrorCode } from "../../config/constants";
import type { ResultOutcome } from "../types/portal.types";

/**
 * Base class for all portal errors.
 * Includes an error code for classification in logs and API responses.
 */
export class PortalError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = false) {
    super(message);
    this.name = "PortalError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Client certificate bundle, passphrase or CA material could not be used */
export class CredentialError extends PortalError {
  constructor(message: string = "Client credentials could not be loaded") {
    super(message, ERROR_CODES.CREDENTIAL_INVALID, false);
    this.name = "CredentialError";
  }
}

/** Network, TLS or HTTP-level failure talking to the portal */
export class TransportError extends PortalError {
  public readonly status?: number;

  constructor(message: string = "Portal unreachable", status?: number) {
    super(message, ERROR_CODES.PORTAL_UNREACHABLE, true);
    this.name = "TransportError";
    this.status = status;
  }
}

/** Text could not be converted to or from the portal's legacy encoding */
export class EncodingError extends PortalError {
  constructor(message: string = "Legacy encoding conversion failed") {
    super(message, ERROR_CODES.ENCODING_FAILED, false);
    this.name = "EncodingError";
  }
}

/**
 * An expected menu, form, table or marker is missing from a page.
 * Usually the portal changed its layout or the session is no longer logged in.
 */
export class StructuralError extends PortalError {
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ERROR_CODES.PAGE_STRUCTURE_CHANGED, false);
    this.name = "StructuralError";
    this.context = context;
  }
}

/** No form on the page has an action matching the requested step */
export class FormNotFoundError extends StructuralError {
  constructor(pageUrl: string, expected: string) {
    super(`No form with action matching ${expected} on ${pageUrl}`, { pageUrl, expected });
    this.name = "FormNotFoundError";
  }
}

/** The portal rejected the request at the business level */
export class ApplicationError extends PortalError {
  public readonly messages: string[];
  public readonly outcome?: ResultOutcome;

  constructor(messages: string[], outcome?: ResultOutcome) {
    super(messages.join("; "), ERROR_CODES.APPLICATION_REJECTED, false);
    this.name = "ApplicationError";
    this.messages = messages;
    this.outcome = outcome;
  }
}

/** The caller aborted the workflow through its AbortSignal */
export class WorkflowCancelledError extends PortalError {
  constructor(message: string = "Workflow cancelled") {
    super(message, ERROR_CODES.CANCELLED, false);
    this.name = "WorkflowCancelledError";
  }
}

/** Workflow input failed schema validation */
export class InputValidationError extends PortalError {
  constructor(message: string = "Input validation failed") {
    super(message, ERROR_CODES.VALIDATION_FAILED, false);
    this.name = "InputValidationError";
  }
}

/** A workflow needs a setting this deployment left empty */
export class ConfigurationError extends PortalError {
  constructor(setting: string) {
    super(`${setting} is not configured`, ERROR_CODES.NOT_CONFIGURED, false);
    this.name = "ConfigurationError";
  }
}
