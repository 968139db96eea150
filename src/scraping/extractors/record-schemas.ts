/**
 * Record Schemas
 *
 * The portal's page layouts as data: column order of each listing and the
 * caption table of each detail page, plus the mappers from extracted cells
 * to typed records. Captions are the portal's own labels, including its
 * spelling variants (電子メール / 電子メイル, Fax番号 / FAX番号).
 */
import { PAGE_MARKERS } from "../../config/constants";
import type {
  HandleDetail,
  Ipv4Registration,
  Ipv6Registration,
  RegistrationDetail,
  RequestEntry,
} from "../../shared/types/portal.types";
import type { ExtractedRecord, FieldSpec, RowSchema, TitleValueSchema } from "./table.extractor";

function text<K extends string>(field: K): FieldSpec<K> {
  return { field, rule: "text" };
}

function linked<K extends string>(field: K): FieldSpec<K> {
  return { field, rule: "textWithLink" };
}

function textOf<K extends string>(record: ExtractedRecord<K>, field: K): string {
  return record[field]?.text ?? "";
}

function linkOf<K extends string>(record: ExtractedRecord<K>, field: K): string {
  return record[field]?.link ?? "";
}

// --- IPv4 registration listing ---

export type Ipv4Field = Exclude<keyof Ipv4Registration, "detailLink" | "detail">;

export const IPV4_LISTING_SCHEMA: RowSchema<Ipv4Field> = {
  mode: "row",
  cellClass: PAGE_MARKERS.LISTING_CELL_CLASS,
  dropHeaderRecord: true,
  fields: [
    linked("ipAddress"),
    text("size"),
    text("networkName"),
    text("assignDate"),
    text("returnDate"),
    text("orgName"),
    text("shortName"),
    text("recepNo"),
    text("deliNo"),
    text("type"),
    text("kindId"),
  ],
};

export function toIpv4Registration(record: ExtractedRecord<Ipv4Field>): Ipv4Registration {
  return {
    ipAddress: textOf(record, "ipAddress"),
    size: textOf(record, "size"),
    networkName: textOf(record, "networkName"),
    assignDate: textOf(record, "assignDate"),
    returnDate: textOf(record, "returnDate"),
    orgName: textOf(record, "orgName"),
    shortName: textOf(record, "shortName"),
    recepNo: textOf(record, "recepNo"),
    deliNo: textOf(record, "deliNo"),
    type: textOf(record, "type"),
    kindId: textOf(record, "kindId"),
    detailLink: linkOf(record, "ipAddress"),
  };
}

// --- IPv6 registration listing ---

export type Ipv6Field = Exclude<keyof Ipv6Registration, "detailLink" | "detail">;

export const IPV6_LISTING_SCHEMA: RowSchema<Ipv6Field> = {
  mode: "row",
  cellClass: PAGE_MARKERS.LISTING_CELL_CLASS,
  dropHeaderRecord: true,
  fields: [
    linked("ipAddress"),
    text("networkName"),
    text("assignDate"),
    text("returnDate"),
    text("orgName"),
    text("shortName"),
    text("recepNo"),
    text("deliNo"),
    text("kindId"),
  ],
};

export function toIpv6Registration(record: ExtractedRecord<Ipv6Field>): Ipv6Registration {
  return {
    ipAddress: textOf(record, "ipAddress"),
    networkName: textOf(record, "networkName"),
    assignDate: textOf(record, "assignDate"),
    returnDate: textOf(record, "returnDate"),
    orgName: textOf(record, "orgName"),
    shortName: textOf(record, "shortName"),
    recepNo: textOf(record, "recepNo"),
    deliNo: textOf(record, "deliNo"),
    kindId: textOf(record, "kindId"),
    detailLink: linkOf(record, "ipAddress"),
  };
}

// --- Request list ---

export type RequestField = keyof RequestEntry;

/** Plain table without data-cell classes; columns follow the cell's row position */
export const REQUEST_LIST_SCHEMA: RowSchema<RequestField> = {
  mode: "row",
  columnIndex: "sibling",
  dropHeaderRecord: true,
  fields: [
    text("recepNo"),
    text("deliNo"),
    text("applyKind"),
    text("applyClass"),
    text("applicant"),
    text("applyDate"),
    text("completeDate"),
    text("status"),
  ],
};

export function toRequestEntry(record: ExtractedRecord<RequestField>): RequestEntry {
  return {
    recepNo: textOf(record, "recepNo"),
    deliNo: textOf(record, "deliNo"),
    applyKind: textOf(record, "applyKind"),
    applyClass: textOf(record, "applyClass"),
    applicant: textOf(record, "applicant"),
    applyDate: textOf(record, "applyDate"),
    completeDate: textOf(record, "completeDate"),
    status: textOf(record, "status"),
  };
}

// --- Registration detail ---

export type DetailField = Exclude<keyof RegistrationDetail, "adminHandleLink" | "techHandleLink">;

export const REGISTRATION_DETAIL_SCHEMA: TitleValueSchema<DetailField> = {
  mode: "titleValue",
  cellSelector: "table table table table td",
  labels: {
    "IPネットワークアドレス": text("ipAddress"),
    "資源管理者略称": text("shortName"),
    "アドレス種別": text("type"),
    "インフラ・ユーザ区分": text("infraUserKind"),
    "ネットワーク名": text("networkName"),
    "組織名": text("org"),
    "Organization": text("orgEn"),
    "郵便番号": text("postCode"),
    "住所": text("address"),
    "Address": text("addressEn"),
    "管理者連絡窓口": linked("adminHandle"),
    "技術連絡担当者": linked("techHandle"),
    "ネームサーバ": text("nameServer"),
    "DSレコード": text("dsRecord"),
    "通知アドレス": text("notifyAddress"),
    "審議番号": text("deliNo"),
    "受付番号": text("recepNo"),
    "割当年月日": text("assignDate"),
    "返却年月日": text("returnDate"),
    "最終更新": text("updateDate"),
  },
};

export function toRegistrationDetail(record: ExtractedRecord<DetailField>): RegistrationDetail {
  return {
    ipAddress: textOf(record, "ipAddress"),
    shortName: textOf(record, "shortName"),
    type: textOf(record, "type"),
    infraUserKind: textOf(record, "infraUserKind"),
    networkName: textOf(record, "networkName"),
    org: textOf(record, "org"),
    orgEn: textOf(record, "orgEn"),
    postCode: textOf(record, "postCode"),
    address: textOf(record, "address"),
    addressEn: textOf(record, "addressEn"),
    adminHandle: textOf(record, "adminHandle"),
    adminHandleLink: linkOf(record, "adminHandle"),
    techHandle: textOf(record, "techHandle"),
    techHandleLink: linkOf(record, "techHandle"),
    nameServer: textOf(record, "nameServer"),
    dsRecord: textOf(record, "dsRecord"),
    notifyAddress: textOf(record, "notifyAddress"),
    deliNo: textOf(record, "deliNo"),
    recepNo: textOf(record, "recepNo"),
    assignDate: textOf(record, "assignDate"),
    returnDate: textOf(record, "returnDate"),
    updateDate: textOf(record, "updateDate"),
  };
}

// --- Handle (person or group) ---

export type HandleField =
  | "personHandle"
  | "groupHandle"
  | Exclude<keyof HandleDetail, "isPersonHandle" | "handle">;

export const HANDLE_DETAIL_SCHEMA: TitleValueSchema<HandleField> = {
  mode: "titleValue",
  cellSelector: "table table table td",
  labels: {
    "グループハンドル": text("groupHandle"),
    "グループ名": text("org"),
    "Group Name": text("orgEn"),
    "JPNICハンドル": text("personHandle"),
    "氏名": text("org"),
    "Last, First": text("orgEn"),
    "電子メール": text("email"),
    "電子メイル": text("email"),
    "組織名": text("org"),
    "Organization": text("orgEn"),
    "部署": text("division"),
    "Division": text("divisionEn"),
    "肩書": text("title"),
    "Title": text("titleEn"),
    "電話番号": text("tel"),
    "Fax番号": text("fax"),
    "FAX番号": text("fax"),
    "通知アドレス": text("notifyAddress"),
    "最終更新": text("updateDate"),
  },
};

export function toHandleDetail(record: ExtractedRecord<HandleField>): HandleDetail {
  const isPersonHandle = record.personHandle !== undefined;
  return {
    isPersonHandle,
    handle: isPersonHandle ? textOf(record, "personHandle") : textOf(record, "groupHandle"),
    org: textOf(record, "org"),
    orgEn: textOf(record, "orgEn"),
    email: textOf(record, "email"),
    division: textOf(record, "division"),
    divisionEn: textOf(record, "divisionEn"),
    title: textOf(record, "title"),
    titleEn: textOf(record, "titleEn"),
    tel: textOf(record, "tel"),
    fax: textOf(record, "fax"),
    notifyAddress: textOf(record, "notifyAddress"),
    updateDate: textOf(record, "updateDate"),
  };
}

/** First record of a title/value extraction (there is always exactly one) */
export function single<K extends string>(records: Iterable<ExtractedRecord<K>>): ExtractedRecord<K> {
  for (const record of records) {
    return record;
  }
  return {};
}
