/**
 * In-process stand-in for the registry portal.
 *
 * Plugs into axios as a custom adapter: requests never leave the process.
 * Replies are given as native text and served as Shift_JIS bytes; request
 * bodies are decoded back for assertions.
 */
import axios, {
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
  type RawAxiosResponseHeaders,
} from "axios";
import * as iconv from "iconv-lite";
import { PortalSession } from "../../src/scraping/session/portal-session";
import { RateLimiter } from "../../src/scraping/traversal/rate-limiter";
import { ErrorClassifier } from "../../src/processing/error-classifier";
import type { WorkflowDependencies } from "../../src/workflows/workflow-context";
import { ManualClock } from "./manual-clock";

export const BASE_URL = "https://portal.test";
export const LOGIN_PATH = "/jpnic/login.do";
export const INTERVAL_MS = 100;

export interface FakeReply {
  status?: number;
  /** Text is sent as Shift_JIS; a Buffer is sent as is */
  body?: string | Buffer;
  headers?: RawAxiosResponseHeaders;
}

export interface RecordedRequest {
  method: string;
  url: string;
  /** Shift_JIS-decoded body ("" for none) */
  body: string;
  cookie: string;
  contentType: string;
}

type Handler = (request: RecordedRequest) => FakeReply;

function headerValue(config: InternalAxiosRequestConfig, name: string): string {
  const value = config.headers.get(name);
  return typeof value === "string" ? value : "";
}

export function absolute(path: string): string {
  return new URL(path, BASE_URL).toString();
}

export class FakePortal {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Handler>();

  on(method: "GET" | "POST", path: string, reply: FakeReply | Handler): this {
    this.routes.set(`${method} ${absolute(path)}`, typeof reply === "function" ? reply : () => reply);
    return this;
  }

  get(path: string, reply: FakeReply | Handler): this {
    return this.on("GET", path, reply);
  }

  post(path: string, reply: FakeReply | Handler): this {
    return this.on("POST", path, reply);
  }

  /** "GET https://portal.test/..." for each request made so far */
  trail(): string[] {
    return this.requests.map((request) => `${request.method} ${request.url}`);
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = {
      method: (config.method ?? "get").toUpperCase(),
      url: config.url ?? "",
      body: Buffer.isBuffer(config.data) ? iconv.decode(config.data, "Shift_JIS") : "",
      cookie: headerValue(config, "Cookie"),
      contentType: headerValue(config, "Content-Type"),
    };
    this.requests.push(request);

    const handler = this.routes.get(`${request.method} ${request.url}`);
    const reply: FakeReply = handler ? handler(request) : { status: 404, body: "Not Found" };
    const body = reply.body ?? "";

    const response: AxiosResponse<Buffer> = {
      data: typeof body === "string" ? iconv.encode(body, "Shift_JIS") : body,
      status: reply.status ?? 200,
      statusText: "",
      headers: reply.headers ?? {},
      config,
    };
    return response;
  };

  session(maxRedirects: number = 5): PortalSession {
    return new PortalSession(axios.create({ adapter: this.adapter }), {
      baseUrl: BASE_URL,
      maxRedirects,
    });
  }
}

export interface FakeDependencies extends WorkflowDependencies {
  clock: ManualClock;
  closedSessions: () => number;
}

/**
 * Workflow dependencies wired to the fake portal. Sessions are counted so
 * tests can check that each run closes the one it opened.
 */
export function fakeDependencies(
  portal: FakePortal,
  overrides: Partial<WorkflowDependencies> = {}
): FakeDependencies {
  const clock = new ManualClock();
  let closed = 0;

  return {
    openSession: () => {
      const session = portal.session();
      const close = session.close.bind(session);
      session.close = () => {
        closed++;
        close();
      };
      return session;
    },
    loginPath: LOGIN_PATH,
    transactionUrl: "",
    classifier: new ErrorClassifier(),
    createRateLimiter: () => new RateLimiter(INTERVAL_MS, clock),
    clock,
    closedSessions: () => closed,
    ...overrides,
  };
}
