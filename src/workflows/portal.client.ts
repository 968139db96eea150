/**
 * Portal Client
 *
 * Public entry point of the engine. Validates each input, then runs the
 * workflow on a fresh session. Safe to share: nothing is kept between calls
 * except configuration.
 */
import config from "../config";
import type {
  HandleDetail,
  Ipv4Registration,
  Ipv4SearchCriteria,
  Ipv6Registration,
  Ipv6SearchCriteria,
  RegistrationDetail,
  RequestEntry,
  ResultOutcome,
  SearchResult,
  ContactChangeInput,
  WebTransaction,
} from "../shared/types/portal.types";
import { initializeSession } from "../scraping/session/portal-session";
import { loadClientCredentials } from "../scraping/session/credentials";
import { RateLimiter } from "../scraping/traversal/rate-limiter";
import {
  createStatusTextLookup,
  ErrorClassifier,
  loadStatusTextTable,
} from "../processing/error-classifier";
import {
  validateContactChange,
  validateDetailLink,
  validateHandle,
  validateIpv4Search,
  validateIpv6Search,
  validateRecepNo,
  validateWebTransaction,
} from "../processing/input-validator";
import { searchIpv4, searchIpv6 } from "./search.workflow";
import { getHandleDetail, getRegistrationDetail } from "./detail.workflow";
import { getResourceSummary, type ResourceSummaryResult } from "./resource.workflow";
import { changeContactInfo } from "./contact.workflow";
import { listRequests } from "./requests.workflow";
import { sendTransaction } from "./transaction.workflow";
import type { WorkflowDependencies, WorkflowOptions } from "./workflow-context";

/** Search criteria as accepted from callers; omitted fields take defaults */
export type Ipv4SearchInput = Partial<Ipv4SearchCriteria>;
export type Ipv6SearchInput = Partial<Ipv6SearchCriteria>;
export type ContactChangeRequest = Partial<ContactChangeInput> &
  Pick<ContactChangeInput, "isPersonHandle" | "applyMail">;

export class PortalClient {
  constructor(private readonly deps: WorkflowDependencies) {}

  async searchIpv4(
    criteria: Ipv4SearchInput,
    options?: WorkflowOptions
  ): Promise<SearchResult<Ipv4Registration>> {
    return searchIpv4(this.deps, validateIpv4Search(criteria), options);
  }

  async searchIpv6(
    criteria: Ipv6SearchInput,
    options?: WorkflowOptions
  ): Promise<SearchResult<Ipv6Registration>> {
    return searchIpv6(this.deps, validateIpv6Search(criteria), options);
  }

  async getRegistrationDetail(link: string, options?: WorkflowOptions): Promise<RegistrationDetail> {
    return getRegistrationDetail(this.deps, validateDetailLink(link), options);
  }

  async getHandleDetail(handle: string, options?: WorkflowOptions): Promise<HandleDetail> {
    return getHandleDetail(this.deps, validateHandle(handle), options);
  }

  async getResourceSummary(options?: WorkflowOptions): Promise<ResourceSummaryResult> {
    return getResourceSummary(this.deps, options);
  }

  async changeContactInfo(input: ContactChangeRequest, options?: WorkflowOptions): Promise<string> {
    return changeContactInfo(this.deps, validateContactChange(input), options);
  }

  async listRequests(recepNo: string, options?: WorkflowOptions): Promise<RequestEntry[]> {
    return listRequests(this.deps, validateRecepNo(recepNo), options);
  }

  async sendTransaction(transaction: WebTransaction, options?: WorkflowOptions): Promise<ResultOutcome> {
    return sendTransaction(this.deps, validateWebTransaction(transaction), options);
  }
}

/**
 * Build the client from environment configuration.
 * Credentials are read when each workflow opens its session, so a
 * replaced certificate takes effect without a restart.
 *
 * @throws Error if the status text table cannot be loaded
 */
export function createPortalClient(): PortalClient {
  const classifier = new ErrorClassifier(
    createStatusTextLookup(loadStatusTextTable(config.statusTextFile))
  );

  return new PortalClient({
    openSession: () =>
      initializeSession(
        loadClientCredentials({
          pfxPath: config.pfxPath,
          passphrase: config.pfxPassphrase,
          caPath: config.caPath,
        }),
        {
          baseUrl: config.portalBaseUrl,
          maxRedirects: config.maxRedirects,
          timeoutMs: config.requestTimeoutMs,
        }
      ),
    loginPath: config.portalLoginPath,
    transactionUrl: config.portalTransactionUrl,
    classifier,
    createRateLimiter: () => new RateLimiter(config.detailFetchIntervalMs),
  });
}
