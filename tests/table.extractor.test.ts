import { describe, it, expect } from "vitest";
import {
  extractRecords,
  parseUsageRatio,
  type RowSchema,
} from "../src/scraping/extractors/table.extractor";
import {
  HANDLE_DETAIL_SCHEMA,
  IPV4_LISTING_SCHEMA,
  IPV6_LISTING_SCHEMA,
  REGISTRATION_DETAIL_SCHEMA,
  REQUEST_LIST_SCHEMA,
  single,
  toHandleDetail,
  toIpv4Registration,
  toIpv6Registration,
  toRegistrationDetail,
  toRequestEntry,
} from "../src/scraping/extractors/record-schemas";
import { StructuralError } from "../src/shared/errors/portal.errors";
import {
  gridTable,
  groupHandlePage,
  html,
  IPV4_HEADER,
  listingPage,
  page,
  personHandlePage,
  registrationDetailPage,
  titleValueTable,
} from "./helpers/pages";

describe("Table Extractor", () => {
  describe("row mode", () => {
    it("should drop the repeated header and map each group of cells to a registration", () => {
      const { $ } = page(
        listingPage(IPV4_HEADER, [
          {
            link: "/jpnic/entryinfo_v4.do?netwrk_id=1",
            cells: ["192.0.2.0/24", "256", "EXAMPLE-NET", "2020/04/01", "", "Example Co.", "EXAMPLENET", "R100", "D100", "ASSIGNED", "PA"],
          },
          {
            link: "/jpnic/entryinfo_v4.do?netwrk_id=2",
            cells: ["198.51.100.0/25", "128", "TEST-NET", "2021/05/01", "", "Test Co.", "EXAMPLENET", "R101", "D101", "ASSIGNED", "PA"],
          },
        ])
      );

      const records = Array.from(extractRecords($, IPV4_LISTING_SCHEMA), toIpv4Registration);

      expect(records).toHaveLength(2);
      expect(records[0]).toEqual({
        ipAddress: "192.0.2.0/24",
        size: "256",
        networkName: "EXAMPLE-NET",
        assignDate: "2020/04/01",
        returnDate: "",
        orgName: "Example Co.",
        shortName: "EXAMPLENET",
        recepNo: "R100",
        deliNo: "D100",
        type: "ASSIGNED",
        kindId: "PA",
        detailLink: "/jpnic/entryinfo_v4.do?netwrk_id=1",
      });
      expect(records[1].ipAddress).toBe("198.51.100.0/25");
      expect(records[1].detailLink).toBe("/jpnic/entryinfo_v4.do?netwrk_id=2");
    });

    it("should yield nothing for a listing holding only its header", () => {
      const { $ } = page(listingPage(IPV4_HEADER, []));

      expect(Array.from(extractRecords($, IPV4_LISTING_SCHEMA))).toEqual([]);
    });

    it("should use the nine-column layout for IPv6", () => {
      const { $ } = page(
        listingPage(IPV4_HEADER.slice(0, 9), [
          {
            link: "/jpnic/entryinfo_v6.do?netwrk_id=9",
            cells: ["2001:db8::/48", "V6-NET", "2022/01/01", "", "Example Co.", "EXAMPLENET", "R200", "D200", "ASSIGNED"],
          },
        ])
      );

      const [record] = Array.from(extractRecords($, IPV6_LISTING_SCHEMA), toIpv6Registration);

      expect(record).toEqual({
        ipAddress: "2001:db8::/48",
        networkName: "V6-NET",
        assignDate: "2022/01/01",
        returnDate: "",
        orgName: "Example Co.",
        shortName: "EXAMPLENET",
        recepNo: "R200",
        deliNo: "D200",
        kindId: "ASSIGNED",
        detailLink: "/jpnic/entryinfo_v6.do?netwrk_id=9",
      });
    });

    it("should place request list cells by their position in the row", () => {
      const { $ } = page(
        html(
          gridTable(1, [
            ["受付番号", "審議番号", "申請種別", "申請区分", "申請者", "申請日", "完了日", "状態"],
            ["20240001", "", "変更", "担当者", "Yamada", "2024/04/01", "2024/04/02", "完了", "extra"],
            ["20240002", "", "登録", "担当者", "Suzuki", "2024/04/03", "", "処理中"],
          ])
        )
      );

      const entries = Array.from(extractRecords($, REQUEST_LIST_SCHEMA), toRequestEntry);

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
        {
          recepNo: "20240002",
          deliNo: "",
          applyKind: "登録",
          applyClass: "担当者",
          applicant: "Suzuki",
          applyDate: "2024/04/03",
          completeDate: "",
          status: "処理中",
        },
      ]);
    });

    it("should decode ratio cells and restart on each iteration", () => {
      const schema: RowSchema<"name" | "usage"> = {
        mode: "row",
        dropHeaderRecord: false,
        fields: [
          { field: "name", rule: "text" },
          { field: "usage", rule: "ratio" },
        ],
      };
      const { $ } = page(html(gridTable(1, [["block", "64/256 (25.00%)"]])));
      const records = extractRecords($, schema);

      expect(Array.from(records)).toEqual([
        {
          name: { text: "block" },
          usage: { text: "64/256 (25.00%)", ratio: { used: 64, total: 256, percent: 25 } },
        },
      ]);
      expect(Array.from(records)).toHaveLength(1);
    });
  });

  describe("titleValue mode", () => {
    it("should map captions to detail fields and keep handle links", () => {
      const { $ } = page(
        registrationDetailPage({
          ipAddress: "192.0.2.0/24",
          networkName: "EXAMPLE-NET",
          admin: "JA001",
          tech: "JT001",
        })
      );

      const detail = toRegistrationDetail(single(extractRecords($, REGISTRATION_DETAIL_SCHEMA)));

      expect(detail.ipAddress).toBe("192.0.2.0/24");
      expect(detail.networkName).toBe("EXAMPLE-NET");
      expect(detail.adminHandle).toBe("JA001");
      expect(detail.adminHandleLink).toBe("/jpnic/entryinfo_handle.do?jpnic_hdl=JA001");
      expect(detail.techHandle).toBe("JT001");
      expect(detail.techHandleLink).toBe("/jpnic/entryinfo_handle.do?jpnic_hdl=JT001");
      expect(detail.updateDate).toBe("2024/04/01");
      expect(detail.org).toBe("");
    });

    it("should skip unknown captions", () => {
      const { $ } = page(
        html(
          titleValueTable(4, [
            ["未知の項目", "ignored"],
            ["ネットワーク名", "EXAMPLE-NET"],
          ])
        )
      );

      expect(single(extractRecords($, REGISTRATION_DETAIL_SCHEMA))).toEqual({
        networkName: { text: "EXAMPLE-NET" },
      });
    });

    it("should recognise a person handle by its JPNIC handle caption", () => {
      const { $ } = page(personHandlePage("JA001", "yamada@example.jp"));

      expect(toHandleDetail(single(extractRecords($, HANDLE_DETAIL_SCHEMA)))).toEqual({
        isPersonHandle: true,
        handle: "JA001",
        org: "山田太郎",
        orgEn: "Yamada, Taro",
        email: "yamada@example.jp",
        division: "",
        divisionEn: "",
        title: "",
        titleEn: "",
        tel: "",
        fax: "",
        notifyAddress: "",
        updateDate: "",
      });
    });

    it("should read a group handle and the alternate mail caption", () => {
      const { $ } = page(groupHandlePage("JG001", "Example NOC"));
      const handle = toHandleDetail(single(extractRecords($, HANDLE_DETAIL_SCHEMA)));

      expect(handle.isPersonHandle).toBe(false);
      expect(handle.handle).toBe("JG001");
      expect(handle.org).toBe("Example NOC");
      expect(handle.email).toBe("noc@example.jp");
    });
  });

  describe("parseUsageRatio", () => {
    it("should read counts and percentage in either order", () => {
      expect(parseUsageRatio("62.50%(160/256)")).toEqual({ used: 160, total: 256, percent: 62.5 });
      expect(parseUsageRatio("1,024/2,048 (50%)")).toEqual({ used: 1024, total: 2048, percent: 50 });
    });

    it("should throw StructuralError when a part is missing", () => {
      expect(() => parseUsageRatio("160/256")).toThrow(StructuralError);
      expect(() => parseUsageRatio("62.5%")).toThrow('No usage ratio in cell "62.5%"');
    });
  });
});
