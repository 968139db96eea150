/**
 * Error Classifier
 *
 * Turns the portal's numeric result codes into readable messages through an
 * injected status-text lookup. The lookup table itself is operator-supplied
 * data (STATUS_TEXT_FILE); this module only reads and applies it.
 */
import * as fs from "fs";
import Joi from "joi";
import type { ClassifiedError } from "../shared/types/portal.types";
import { logger } from "../monitoring/logger";

/** Numeric result code -> human-readable text */
export type StatusTextLookup = (code: number) => string;

export type StatusTextTable = Readonly<Record<string, string>>;

const statusTextTableSchema = Joi.object().pattern(/^\d+$/, Joi.string().allow(""));

export function unknownStatusText(code: number): string {
  return `Unknown status code ${code}`;
}

/**
 * Build a lookup over a `{ "<code>": "<text>" }` table.
 * Keys are compared numerically, so "010" and "10" are the same code.
 */
export function createStatusTextLookup(table: StatusTextTable = {}): StatusTextLookup {
  const texts = new Map<number, string>();
  for (const [key, text] of Object.entries(table)) {
    texts.set(Number.parseInt(key, 10), text);
  }
  return (code) => texts.get(code) ?? unknownStatusText(code);
}

/**
 * Read a status-text table from a JSON file.
 * An empty path yields an empty table.
 *
 * @throws Error if the file cannot be read or is not a code -> text object
 */
export function loadStatusTextTable(filePath: string): StatusTextTable {
  if (!filePath) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new Error(`Status text table ${filePath} could not be read: ${(error as Error).message}`);
  }

  const { error, value } = statusTextTableSchema.validate(parsed);
  if (error) {
    throw new Error(`Status text table ${filePath} is invalid: ${error.message}`);
  }

  const table: Record<string, string> = value;
  logger.info({ filePath, codes: Object.keys(table).length }, "Status text table loaded");
  return table;
}

export class ErrorClassifier {
  constructor(private readonly lookup: StatusTextLookup = createStatusTextLookup()) {}

  /** Text for a code as the portal prints it (e.g. "012", "3") */
  statusText(code: string): string {
    const numeric = Number.parseInt(code, 10);
    return Number.isNaN(numeric) ? `Unknown status code ${code}` : this.lookup(numeric);
  }

  /** `{ code, message: "<code>: <text>" }` */
  classify(code: string): ClassifiedError {
    return { code, message: `${code}: ${this.statusText(code)}` };
  }
}
