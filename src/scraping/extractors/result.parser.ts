/**
 * Key/Value Result Parser
 *
 * Decodes the transactional endpoint's plain-text answer:
 *
 *   RET=00
 *   RET_CODE=00000120
 *   RECEP_NO=20240001
 *   ADM_JPNIC_HDL=...
 *
 * RET is the overall code ("00" = accepted). Each RET_CODE is an 8-character
 * composite: characters 4..6 are the interface code ("000" = no error) and
 * characters 7.. the error genre ("0" = no error). A shorter composite has no
 * leading block: its interface code comes first and the genre follows it.
 * A segment that is empty or all zeros reports no error.
 */
import { RESULT_CODES, RESULT_MARKERS } from "../../config/constants";
import type { InterfaceError, ResultOutcome } from "../../shared/types/portal.types";
import type { ErrorClassifier } from "../../processing/error-classifier";

const RET_CODE_LENGTH = 8;
const INTERFACE_START = 4;
const INTERFACE_LENGTH = 3;

/** Split a response body into lines, dropping CR of CRLF endings */
export function splitResultLines(body: string): string[] {
  return body.split("\n").map((line) => line.replace(/\r$/, ""));
}

export function parseResult(lines: Iterable<string>, classifier: ErrorClassifier): ResultOutcome {
  const outcome: ResultOutcome = { overallCode: RESULT_CODES.OK, interfaceErrors: [] };

  for (const rawLine of lines) {
    const line = rawLine.replace(/\r$/, "");

    if (line.startsWith(RESULT_MARKERS.RET_CODE)) {
      const entry = decodeRetCode(line.slice(RESULT_MARKERS.RET_CODE.length), classifier);
      if (entry) outcome.interfaceErrors.push(entry);
    } else if (line.startsWith(RESULT_MARKERS.RET)) {
      outcome.overallCode = line.slice(RESULT_MARKERS.RET.length);
    } else if (line.startsWith(RESULT_MARKERS.RECEP_NO)) {
      outcome.recepNo = line.slice(RESULT_MARKERS.RECEP_NO.length);
    } else if (line.startsWith(RESULT_MARKERS.ADMIN_HANDLE)) {
      outcome.adminHandle = line.slice(RESULT_MARKERS.ADMIN_HANDLE.length);
    } else if (line.startsWith(RESULT_MARKERS.TECH1_HANDLE)) {
      outcome.tech1Handle = line.slice(RESULT_MARKERS.TECH1_HANDLE.length);
    } else if (line.startsWith(RESULT_MARKERS.TECH2_HANDLE)) {
      outcome.tech2Handle = line.slice(RESULT_MARKERS.TECH2_HANDLE.length);
    }
  }

  if (outcome.overallCode !== RESULT_CODES.OK) {
    outcome.topLevelError = classifier.classify(outcome.overallCode);
  }

  return outcome;
}

/**
 * Decode one composite. Returns undefined when it reports no error.
 */
export function decodeRetCode(
  retCode: string,
  classifier: ErrorClassifier
): InterfaceError | undefined {
  const interfaceStart = retCode.length >= RET_CODE_LENGTH ? INTERFACE_START : 0;
  const genreStart = interfaceStart + INTERFACE_LENGTH;
  const interfaceCode = retCode.slice(interfaceStart, genreStart);
  const genreCode = retCode.slice(genreStart);
  const hasInterfaceError = !reportsNoError(interfaceCode);
  const hasGenreError = !reportsNoError(genreCode);

  if (!hasInterfaceError && !hasGenreError) {
    return undefined;
  }

  const parts: string[] = [];
  if (hasInterfaceError) parts.push(classifier.classify(interfaceCode).message);
  if (hasGenreError) parts.push(classifier.statusText(genreCode));
  const message = parts.join("_");

  return { retCode, interfaceCode, genreCode, message };
}

function reportsNoError(segment: string): boolean {
  return /^0*$/.test(segment);
}

/**
 * All error messages of an outcome, top-level first.
 */
export function collectResultErrors(outcome: ResultOutcome): string[] {
  const messages: string[] = [];
  if (outcome.topLevelError) {
    messages.push(outcome.topLevelError.message);
  }
  for (const entry of outcome.interfaceErrors) {
    messages.push(entry.message);
  }
  return messages;
}
