/**
 * Resource Summary Extractor
 *
 * The resource manager page is a three-column grid:
 *   [caption | value | ratio]
 * Manager rows use the first two columns. Overall utilization and the
 * AD ratio put their number in the third. CIDR block rows carry an
 * "entryinfo" link in the first column, the assignment date in the second
 * and the block's utilization in the third.
 */
import * as cheerio from "cheerio";
import { PAGE_MARKERS } from "../../config/constants";
import type {
  ResourceCidrBlock,
  ResourceManagerInfo,
  ResourceSummary,
} from "../../shared/types/portal.types";
import { StructuralError } from "../../shared/errors/portal.errors";
import { parseUsageRatio } from "./table.extractor";

const CELL_SELECTOR = "table table table table td";

const MANAGER_LABELS: Readonly<Record<string, keyof ResourceManagerInfo>> = {
  "資源管理者番号": "resourceManagerNo",
  "資源管理者略称": "shortName",
  "管理組織名": "org",
  "Organization": "orgEn",
  "郵便番号": "zipCode",
  "住所": "address",
  "Address": "addressEn",
  "電話番号": "tel",
  "FAX番号": "fax",
  "資源管理責任者": "resourceManagementManager",
  "連絡担当窓口": "contactPerson",
  "一般問い合わせ窓口": "inquiry",
  "資源管理者通知アドレス": "notifyMail",
  "アサインメントウィンドウサイズ": "assignmentWindowSize",
  "管理開始日": "managementStartDate",
  "管理終了日": "managementEndDate",
  "最終更新日": "updateDate",
};

const TOTAL_USAGE_CAPTION = "総利用率";
const AD_RATIO_CAPTION = "ＡＤ　ｒａｔｉｏ";

function emptyManager(): ResourceManagerInfo {
  return {
    resourceManagerNo: "",
    shortName: "",
    org: "",
    orgEn: "",
    zipCode: "",
    address: "",
    addressEn: "",
    tel: "",
    fax: "",
    resourceManagementManager: "",
    contactPerson: "",
    inquiry: "",
    notifyMail: "",
    assignmentWindowSize: "",
    managementStartDate: "",
    managementEndDate: "",
    updateDate: "",
  };
}

/** "192.0.2.0/24\n\t(detail)" -> "192.0.2.0/24" */
export function cidrAddressFromCaption(caption: string): string {
  return caption.split("(")[0].replace(/[\n\t]/g, "").trim();
}

/**
 * @throws StructuralError if a utilization or AD ratio cell holds no number
 */
export function extractResourceSummary($: cheerio.CheerioAPI): ResourceSummary {
  const summary: ResourceSummary = { manager: emptyManager(), cidrBlocks: [] };

  let title = "";
  let block: Omit<ResourceCidrBlock, "usage"> | undefined;

  for (const element of $(CELL_SELECTOR).toArray()) {
    const cell = $(element);
    const text = cell.text().trim();

    switch (cell.index()) {
      case 0: {
        title = text;
        const href = cell.find("a").attr("href");
        block =
          href !== undefined && href.includes(PAGE_MARKERS.CIDR_BLOCK_LINK)
            ? { address: cidrAddressFromCaption(text), url: href, assignDate: "" }
            : undefined;
        break;
      }
      case 1: {
        if (Object.hasOwn(MANAGER_LABELS, title)) {
          summary.manager[MANAGER_LABELS[title]] = text;
        } else if (block) {
          block.assignDate = text;
        }
        break;
      }
      case 2: {
        if (title === TOTAL_USAGE_CAPTION) {
          summary.usage = parseUsageRatio(text);
        } else if (title === AD_RATIO_CAPTION) {
          summary.adRatio = parseAdRatio(text);
        } else if (block) {
          summary.cidrBlocks.push({ ...block, usage: parseUsageRatio(text) });
          block = undefined;
        }
        break;
      }
    }
  }

  return summary;
}

function parseAdRatio(text: string): number {
  const value = Number.parseFloat(text);
  if (Number.isNaN(value)) {
    throw new StructuralError(`No AD ratio in cell "${text}"`, { text });
  }
  return value;
}
