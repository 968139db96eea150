/**
 * Transaction Workflow
 *
 * Posts a WebTransaction to the transactional endpoint and decodes its
 * RET / RET_CODE answer. Any reported error fails the call with an
 * ApplicationError that carries the decoded outcome. Without a configured
 * endpoint the run fails with ConfigurationError before any request.
 */
import { HTTP } from "../config/constants";
import type { ResultOutcome, WebTransaction } from "../shared/types/portal.types";
import { ApplicationError, ConfigurationError } from "../shared/errors/portal.errors";
import { encodeTransaction } from "../processing/transaction-marshaller";
import { fromLegacy } from "../scraping/session/encoding-bridge";
import {
  collectResultErrors,
  parseResult,
  splitResultLines,
} from "../scraping/extractors/result.parser";
import { runWorkflow, type WorkflowDependencies, type WorkflowOptions } from "./workflow-context";

export function sendTransaction(
  deps: WorkflowDependencies,
  transaction: WebTransaction,
  options: WorkflowOptions = {}
): Promise<ResultOutcome> {
  return runWorkflow("sendTransaction", deps, options, async (ctx) => {
    if (!deps.transactionUrl) {
      throw new ConfigurationError("PORTAL_TRANSACTION_URL");
    }

    const response = await ctx.session.post(deps.transactionUrl, encodeTransaction(transaction), {
      contentType: HTTP.TRANSACTION_CONTENT_TYPE,
      signal: ctx.signal,
    });

    const outcome = parseResult(splitResultLines(fromLegacy(response.body)), deps.classifier);
    const errors = collectResultErrors(outcome);
    if (errors.length > 0) {
      ctx.log.warn({ overallCode: outcome.overallCode, errors }, "Transaction rejected");
      throw new ApplicationError(errors, outcome);
    }

    ctx.log.info({ recepNo: outcome.recepNo }, "Transaction accepted");
    return outcome;
  });
}
