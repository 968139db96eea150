/**
 * Portal Session
 *
 * One authenticated, stateful connection to the registry portal:
 * a mutual-TLS identity, a keep-alive connection pool and a cookie jar.
 *
 * The portal keeps a server-side "current step" pointer keyed by cookie,
 * so a session must only ever carry one request at a time. Workflows open
 * their own session and close it when they finish.
 *
 * Redirects are followed here rather than by axios so that cookies set on
 * intermediate responses (the certificate login sets them on a 302) land
 * in the jar.
 */
import * as https from "https";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import * as cheerio from "cheerio";
import { CookieJar } from "tough-cookie";
import { HTTP } from "../../config/constants";
import {
  TransportError,
  WorkflowCancelledError,
} from "../../shared/errors/portal.errors";
import { logger } from "../../monitoring/logger";
import { fromLegacy } from "./encoding-bridge";
import { type ClientCredentials, verifyClientCredentials } from "./credentials";
import type { FormSubmission } from "../navigators/form-submission";

export interface SessionOptions {
  /** Origin that relative portal paths resolve against */
  baseUrl: string;
  maxRedirects: number;
  /** Per-request timeout in ms (0 = none) */
  timeoutMs?: number;
}

/** Undecoded response after redirects */
export interface RawResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  body: Buffer;
}

/** Decoded and parsed HTML page */
export interface PortalPage {
  url: string;
  html: string;
  $: cheerio.CheerioAPI;
}

export interface PostOptions {
  contentType?: string;
  signal?: AbortSignal;
}

type Method = "GET" | "POST";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
/** Redirects that keep the original method and body */
const METHOD_PRESERVING_REDIRECTS = new Set([307, 308]);

/**
 * Build a session from client credentials.
 *
 * @throws CredentialError if the bundle or CA cannot be used
 */
export function initializeSession(
  credentials: ClientCredentials,
  options: SessionOptions
): PortalSession {
  verifyClientCredentials(credentials);

  const httpsAgent = new https.Agent({
    pfx: credentials.pfx,
    passphrase: credentials.passphrase,
    ca: credentials.ca,
    keepAlive: true,
  });

  const http = axios.create({
    httpsAgent,
    timeout: options.timeoutMs ?? 0,
    headers: { "User-Agent": HTTP.USER_AGENT },
  });

  return new PortalSession(http, options, httpsAgent);
}

export class PortalSession {
  private readonly jar = new CookieJar();

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: SessionOptions,
    private readonly agent?: https.Agent
  ) {}

  /** Resolve a portal path or link against a page URL (default: the base URL) */
  resolveUrl(target: string, base: string = this.options.baseUrl): string {
    return new URL(target, base).toString();
  }

  get(url: string, signal?: AbortSignal): Promise<RawResponse> {
    return this.request("GET", url, undefined, undefined, signal);
  }

  post(url: string, body: Buffer, options: PostOptions = {}): Promise<RawResponse> {
    return this.request(
      "POST",
      url,
      body,
      options.contentType ?? HTTP.FORM_CONTENT_TYPE,
      options.signal
    );
  }

  /** GET a page and decode it from the legacy encoding */
  async getPage(url: string, signal?: AbortSignal): Promise<PortalPage> {
    return toPage(await this.get(url, signal));
  }

  /** POST an encoded form submission and decode the resulting page */
  async submitForm(
    url: string,
    submission: FormSubmission,
    signal?: AbortSignal
  ): Promise<PortalPage> {
    const response = await this.post(url, submission.encode(), {
      contentType: HTTP.FORM_CONTENT_TYPE,
      signal,
    });
    return toPage(response);
  }

  /** Release pooled connections. The session cannot be used afterwards. */
  close(): void {
    this.agent?.destroy();
  }

  private async request(
    method: Method,
    url: string,
    body: Buffer | undefined,
    contentType: string | undefined,
    signal?: AbortSignal
  ): Promise<RawResponse> {
    let currentUrl = this.resolveUrl(url);
    let currentMethod = method;
    let currentBody = body;
    let currentContentType = contentType;

    for (let hop = 0; hop <= this.options.maxRedirects; hop++) {
      const response = await this.send(
        currentMethod,
        currentUrl,
        currentBody,
        currentContentType,
        signal
      );
      await this.storeCookies(response, currentUrl);

      const location = response.headers["location"];
      if (REDIRECT_STATUSES.has(response.status) && typeof location === "string") {
        const nextUrl = this.resolveUrl(location, currentUrl);
        logger.debug(
          { from: currentUrl, to: nextUrl, status: response.status },
          "Following portal redirect"
        );
        if (!METHOD_PRESERVING_REDIRECTS.has(response.status)) {
          currentMethod = "GET";
          currentBody = undefined;
          currentContentType = undefined;
        }
        currentUrl = nextUrl;
        continue;
      }

      if (response.status >= 400) {
        throw new TransportError(
          `Portal returned HTTP ${response.status} for ${currentMethod} ${currentUrl}`,
          response.status
        );
      }

      return {
        url: currentUrl,
        status: response.status,
        body: Buffer.from(response.data),
      };
    }

    throw new TransportError(
      `More than ${this.options.maxRedirects} redirects starting at ${method} ${url}`
    );
  }

  private async send(
    method: Method,
    url: string,
    body: Buffer | undefined,
    contentType: string | undefined,
    signal?: AbortSignal
  ): Promise<AxiosResponse<ArrayBuffer>> {
    if (signal?.aborted) {
      throw new WorkflowCancelledError(`Workflow cancelled before ${method} ${url}`);
    }

    const headers: Record<string, string> = {};
    const cookie = await this.jar.getCookieString(url);
    if (cookie) {
      headers["Cookie"] = cookie;
    }
    if (contentType) {
      headers["Content-Type"] = contentType;
    }

    try {
      return await this.http.request<ArrayBuffer>({
        method,
        url,
        data: body,
        headers,
        signal,
        responseType: "arraybuffer",
        maxRedirects: 0,
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isCancel(error) || signal?.aborted) {
        throw new WorkflowCancelledError(`Workflow cancelled during ${method} ${url}`);
      }
      const detail = axios.isAxiosError(error)
        ? `${error.code ?? "ERR_UNKNOWN"} ${error.message}`
        : String(error);
      logger.warn({ method, url, error: detail }, "Portal request failed");
      throw new TransportError(`${method} ${url} failed: ${detail}`);
    }
  }

  private async storeCookies(response: AxiosResponse<ArrayBuffer>, url: string): Promise<void> {
    const raw = response.headers["set-cookie"];
    const values = Array.isArray(raw) ? raw : typeof raw === "string" ? [raw] : [];
    for (const value of values) {
      await this.jar.setCookie(value, url, { ignoreError: true });
    }
  }
}

function toPage(response: RawResponse): PortalPage {
  const html = fromLegacy(response.body);
  return { url: response.url, html, $: cheerio.load(html) };
}
