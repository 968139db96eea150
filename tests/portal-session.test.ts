import { describe, it, expect } from "vitest";
import axios from "axios";
import { PortalSession } from "../src/scraping/session/portal-session";
import {
  loadClientCredentials,
  verifyClientCredentials,
} from "../src/scraping/session/credentials";
import { FormSubmission } from "../src/scraping/navigators/form-submission";
import {
  CredentialError,
  EncodingError,
  TransportError,
  WorkflowCancelledError,
} from "../src/shared/errors/portal.errors";
import { BASE_URL, FakePortal } from "./helpers/fake-portal";
import { html } from "./helpers/pages";

describe("PortalSession", () => {
  it("should keep cookies set on a redirect for the following requests", async () => {
    const portal = new FakePortal()
      .get("/jpnic/login.do", {
        status: 302,
        headers: { location: "/jpnic/menu.do", "set-cookie": ["JSESSIONID=abc123; Path=/"] },
      })
      .get("/jpnic/menu.do", { body: html("menu") })
      .get("/jpnic/next.do", { body: html("next") });
    const session = portal.session();

    const menu = await session.getPage("/jpnic/login.do");
    await session.getPage("/jpnic/next.do");

    expect(menu.url).toBe("https://portal.test/jpnic/menu.do");
    expect(portal.requests.map((request) => request.cookie)).toEqual([
      "",
      "JSESSIONID=abc123",
      "JSESSIONID=abc123",
    ]);
  });

  it("should turn a POST into a GET on 303", async () => {
    const portal = new FakePortal()
      .post("/jpnic/regist.do", { status: 303, headers: { location: "/jpnic/confirm.do" } })
      .get("/jpnic/confirm.do", { body: html("confirm") });

    await portal.session().submitForm("/jpnic/regist.do", new FormSubmission().set("a", "1"));

    expect(portal.trail()).toEqual([
      "POST https://portal.test/jpnic/regist.do",
      "GET https://portal.test/jpnic/confirm.do",
    ]);
    expect(portal.requests[1].body).toBe("");
  });

  it("should repeat method and body on 307", async () => {
    const portal = new FakePortal()
      .post("/jpnic/regist.do", { status: 307, headers: { location: "/jpnic/regist2.do" } })
      .post("/jpnic/regist2.do", { body: html("ok") });

    await portal.session().submitForm("/jpnic/regist.do", new FormSubmission().set("a", "1"));

    expect(portal.trail()).toEqual([
      "POST https://portal.test/jpnic/regist.do",
      "POST https://portal.test/jpnic/regist2.do",
    ]);
    expect(portal.requests[1].body).toBe("a=1");
    expect(portal.requests[1].contentType).toBe("application/x-www-form-urlencoded");
  });

  it("should give up after the redirect limit", async () => {
    const portal = new FakePortal()
      .get("/a", { status: 302, headers: { location: "/b" } })
      .get("/b", { status: 302, headers: { location: "/c" } })
      .get("/c", { body: "never reached" });

    await expect(portal.session(1).get("/a")).rejects.toThrow(
      new TransportError("More than 1 redirects starting at GET /a")
    );
    expect(portal.requests).toHaveLength(2);
  });

  it("should fail with the HTTP status on an error response", async () => {
    const portal = new FakePortal().get("/jpnic/broken.do", { status: 500, body: "oops" });

    const failure = portal.session().get("/jpnic/broken.do");

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      status: 500,
      message: "Portal returned HTTP 500 for GET https://portal.test/jpnic/broken.do",
      retryable: true,
    });
  });

  it("should wrap adapter failures in TransportError", async () => {
    const session = new PortalSession(
      axios.create({
        adapter: () => Promise.reject(new Error("socket hang up")),
      }),
      { baseUrl: BASE_URL, maxRedirects: 5 }
    );

    await expect(session.get("/jpnic/login.do")).rejects.toThrow(
      "GET https://portal.test/jpnic/login.do failed: Error: socket hang up"
    );
  });

  it("should not send anything once the signal has aborted", async () => {
    const portal = new FakePortal().get("/jpnic/login.do", { body: html("menu") });
    const controller = new AbortController();
    controller.abort();

    await expect(portal.session().get("/jpnic/login.do", controller.signal)).rejects.toBeInstanceOf(
      WorkflowCancelledError
    );
    expect(portal.requests).toHaveLength(0);
  });

  it("should reject a page that is not valid Shift_JIS", async () => {
    const portal = new FakePortal().get("/jpnic/menu.do", { body: Buffer.from([0x41, 0x82]) });

    await expect(portal.session().getPage("/jpnic/menu.do")).rejects.toBeInstanceOf(EncodingError);
  });

  it("should resolve links against the page they appear on", () => {
    const session = new FakePortal().session();

    expect(session.resolveUrl("entryinfo_v4.do?id=1", "https://portal.test/jpnic/list.do")).toBe(
      "https://portal.test/jpnic/entryinfo_v4.do?id=1"
    );
    expect(session.resolveUrl("/jpnic/login.do")).toBe("https://portal.test/jpnic/login.do");
  });
});

describe("Client credentials", () => {
  it("should refuse a bundle that cannot be decoded", () => {
    expect(() =>
      verifyClientCredentials({
        pfx: Buffer.from("not a pkcs12 bundle"),
        passphrase: "test-secret",
        ca: Buffer.from(""),
      })
    ).toThrow(CredentialError);
  });

  it("should name the file it could not read", () => {
    expect(() =>
      loadClientCredentials({
        pfxPath: "/nonexistent/client.p12",
        passphrase: "test-secret",
        caPath: "/nonexistent/ca.pem",
      })
    ).toThrow("Failed to read client certificate bundle at /nonexistent/client.p12");
  });
});
