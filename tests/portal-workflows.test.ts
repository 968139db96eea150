import { describe, it, expect } from "vitest";
import { getHandleDetail, getRegistrationDetail } from "../src/workflows/detail.workflow";
import { listRequests } from "../src/workflows/requests.workflow";
import { getResourceSummary } from "../src/workflows/resource.workflow";
import { sendTransaction } from "../src/workflows/transaction.workflow";
import { PortalClient } from "../src/workflows/portal.client";
import {
  createStatusTextLookup,
  ErrorClassifier,
} from "../src/processing/error-classifier";
import { MENU_LABELS } from "../src/config/constants";
import {
  ApplicationError,
  ConfigurationError,
  InputValidationError,
} from "../src/shared/errors/portal.errors";
import { metrics } from "../src/monitoring/metrics.collector";
import { FakePortal, fakeDependencies, LOGIN_PATH } from "./helpers/fake-portal";
import {
  form,
  gridTable,
  groupHandlePage,
  hidden,
  html,
  menuPage,
  registrationDetailPage,
  RESOURCE_ROWS,
} from "./helpers/pages";

const MENU = menuPage({
  [MENU_LABELS.SEARCH_IPV6]: "/jpnic/G11320.do",
  [MENU_LABELS.HANDLE_SEARCH]: "/jpnic/G15100.do",
  [MENU_LABELS.REQUEST_LIST]: "/jpnic/G13100.do",
  [MENU_LABELS.RESOURCE_MANAGER]: "/jpnic/G14100.do",
});

function portalWithMenu(): FakePortal {
  return new FakePortal().get(LOGIN_PATH, { body: MENU });
}

describe("Registration detail", () => {
  it("should log in and fetch the linked detail page", async () => {
    const portal = portalWithMenu().get("/jpnic/entryinfo_v4.do?netwrk_id=7", {
      body: registrationDetailPage({
        ipAddress: "192.0.2.0/24",
        networkName: "EXAMPLE-NET",
        admin: "JA001",
        tech: "JT001",
      }),
    });

    const detail = await getRegistrationDetail(
      fakeDependencies(portal),
      "/jpnic/entryinfo_v4.do?netwrk_id=7"
    );

    expect(detail.networkName).toBe("EXAMPLE-NET");
    expect(detail.techHandle).toBe("JT001");
    expect(portal.trail()).toEqual([
      "GET https://portal.test/jpnic/login.do",
      "GET https://portal.test/jpnic/entryinfo_v4.do?netwrk_id=7",
    ]);
  });
});

describe("Handle detail", () => {
  it("should open the IPv6 search menu before asking for the handle", async () => {
    const portal = portalWithMenu()
      .get("/jpnic/G11320.do", { body: html(form("/jpnic/G11321.do", "")) })
      .get("/jpnic/entryinfo_handle.do?jpnic_hdl=JG001", {
        body: groupHandlePage("JG001", "Example NOC"),
      });

    const handle = await getHandleDetail(fakeDependencies(portal), "JG001");

    expect(handle).toMatchObject({ isPersonHandle: false, handle: "JG001", org: "Example NOC" });
    expect(portal.trail()).toEqual([
      "GET https://portal.test/jpnic/login.do",
      "GET https://portal.test/jpnic/G11320.do",
      "GET https://portal.test/jpnic/entryinfo_handle.do?jpnic_hdl=JG001",
    ]);
  });
});

describe("Request list", () => {
  it("should search from the receipt number and read the entries", async () => {
    const portal = portalWithMenu()
      .get("/jpnic/G13100.do", { body: html(form("/jpnic/G13110.do", hidden({ destdisp: "D9" }))) })
      .post("/jpnic/G13110.do", {
        body: html(
          gridTable(1, [
            ["受付番号", "審議番号", "申請種別", "申請区分", "申請者", "申請日", "完了日", "状態"],
            ["20240001", "", "変更", "担当者", "Yamada", "2024/04/01", "2024/04/02", "完了"],
          ])
        ),
      });

    const entries = await listRequests(fakeDependencies(portal), "20240001");

    expect(entries).toEqual([
      {
        recepNo: "20240001",
        deliNo: "",
        applyKind: "変更",
        applyClass: "担当者",
        applicant: "Yamada",
        applyDate: "2024/04/01",
        completeDate: "2024/04/02",
        status: "完了",
      },
    ]);
    expect(portal.requests[2].body).toBe(
      "destdisp=D9&startRecepNo=20240001&endRecepNo=&deliNo=&aplyKind=&aplyClass=&resceAdmSnm=" +
        "&aplyDateS=&aplyDateE=&completDateS=&completDateE=&statusId=" +
        "&pswdResceNewConfirm=%81%40%8C%9F%8D%F5%81%40"
    );
  });
});

describe("Resource summary", () => {
  it("should return the summary together with the page it was read from", async () => {
    const resourcePage = html(gridTable(4, RESOURCE_ROWS));
    const portal = portalWithMenu().get("/jpnic/G14100.do", { body: resourcePage });

    const result = await getResourceSummary(fakeDependencies(portal));

    expect(result.summary.manager.shortName).toBe("EXAMPLENET");
    expect(result.summary.adRatio).toBe(0.85);
    expect(result.summary.cidrBlocks.map((block) => block.address)).toEqual([
      "192.0.2.0/24",
      "198.51.100.0/25",
    ]);
    expect(result.html).toBe(resourcePage);
  });
});

describe("Transactions", () => {
  const TRANSACTION_URL = "https://portal.test/jpnic/txn.do";
  const classifier = new ErrorClassifier(
    createStatusTextLookup({ "10": "Input error", "12": "Invalid address" })
  );
  const transaction = { fields: [{ key: "IP_ADDRESS", value: "192.0.2.0/24" }] };

  it("should post the fields as text and decode an accepted answer", async () => {
    const portal = new FakePortal().post("/jpnic/txn.do", {
      body: "RET=00\r\nRECEP_NO=20240001\r\nADM_JPNIC_HDL=JA001\r\n",
    });

    const outcome = await sendTransaction(
      fakeDependencies(portal, { transactionUrl: TRANSACTION_URL, classifier }),
      transaction
    );

    expect(outcome).toEqual({
      overallCode: "00",
      recepNo: "20240001",
      adminHandle: "JA001",
      interfaceErrors: [],
    });
    expect(portal.requests[0].body).toBe("IP_ADDRESS=192.0.2.0/24\r\n");
    expect(portal.requests[0].contentType).toBe("text/html");
  });

  it("should reject with every classified error", async () => {
    const portal = new FakePortal().post("/jpnic/txn.do", {
      body: "RET=10\r\nRET_CODE=00000120\r\n",
    });

    const failure = sendTransaction(
      fakeDependencies(portal, { transactionUrl: TRANSACTION_URL, classifier }),
      transaction
    );

    await expect(failure).rejects.toBeInstanceOf(ApplicationError);
    await expect(failure).rejects.toMatchObject({
      messages: ["10: Input error", "012: Invalid address"],
      outcome: { overallCode: "10" },
    });
  });

  it("should fail as a workflow when no transaction endpoint is configured", async () => {
    const portal = new FakePortal();
    const deps = fakeDependencies(portal);
    const labels = { workflow: "sendTransaction", status: "error" };
    const before = metrics.get("portal_workflows_total", labels);

    const failure = sendTransaction(deps, transaction);

    await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
    await expect(failure).rejects.toThrow("PORTAL_TRANSACTION_URL is not configured");
    expect(portal.requests).toHaveLength(0);
    expect(deps.closedSessions()).toBe(1);
    expect(metrics.get("portal_workflows_total", labels)).toBe(before + 1);
  });
});

describe("PortalClient", () => {
  it("should reject invalid input before touching the portal", async () => {
    const portal = portalWithMenu();
    const client = new PortalClient(fakeDependencies(portal));

    await expect(client.getHandleDetail("JA001&x=1")).rejects.toBeInstanceOf(InputValidationError);
    await expect(client.getRegistrationDetail("https://elsewhere.example/")).rejects.toBeInstanceOf(
      InputValidationError
    );
    await expect(client.searchIpv4({ networkName: "EXAMPLE\nNET" })).rejects.toBeInstanceOf(
      InputValidationError
    );
    expect(portal.requests).toHaveLength(0);
  });

  it("should pass validated input on to the workflow", async () => {
    const portal = portalWithMenu().get("/jpnic/entryinfo_handle.do?jpnic_hdl=JG001", {
      body: groupHandlePage("JG001", "Example NOC"),
    }).get("/jpnic/G11320.do", { body: html("<p>search</p>") });
    const client = new PortalClient(fakeDependencies(portal));

    const handle = await client.getHandleDetail(" JG001 ");

    expect(handle.handle).toBe("JG001");
  });
});
