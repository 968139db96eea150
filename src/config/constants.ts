/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes the portal's menu labels, form field names, pre-encoded button
 * captions, page markers and error codes. These are the portal's own strings:
 * a change here usually means the portal changed, not this service.
 */

// --- Menu Labels ---
// Visible anchor text on the top-level menu page, matched exactly.
export const MENU_LABELS = {
  SEARCH_IPV4: "登録情報検索(IPv4)",
  SEARCH_IPV6: "登録情報検索(IPv6)",
  HANDLE_SEARCH: "担当グループ・JPNICハンドル検索／変換",
  CONTACT_CHANGE: "担当グループ（担当者）情報登録・変更",
  REQUEST_LIST: "申請一覧",
  RESOURCE_MANAGER: "資源管理者情報",
} as const;

// --- Portal Paths ---
export const PORTAL_PATHS = {
  HANDLE_DETAIL: "/jpnic/entryinfo_handle.do",
} as const;

// --- Form Fields ---
export const FORM_FIELDS = {
  TOKEN: "org.apache.struts.taglib.html.TOKEN",
  DEST_DISP: "destdisp",
  APPLY_ID: "aplyid",
  PREV_DISP_ID: "prevDispId",
  OWN_SHORT_NAME: "resceAdmSnm",
} as const;

// --- Action Buttons ---
// Either literal captions (transcoded with the rest of the body) or captions
// already percent-encoded in Shift_JIS, which must go out byte for byte.
export const ACTION_CAPTIONS = {
  /** "　検索　" as literal text */
  SEARCH_LITERAL: "　検索　",
  /** "　検索　" pre-encoded */
  SEARCH_ENCODED: "%81%40%8C%9F%8D%F5%81%40",
  /** "申請" pre-encoded */
  APPLY_ENCODED: "%90%5C%90%BF",
  /** "確認" pre-encoded */
  CONFIRM_ENCODED: "%8Am%94F",
} as const;

// --- Form Action Fragments ---
export const FORM_ACTIONS = {
  REGISTER: "regist.do",
  APPLY: "apply",
} as const;

// --- Page Markers ---
export const PAGE_MARKERS = {
  /** Class of the live data cells on registration listings */
  LISTING_CELL_CLASS: "dataRow_mnt04",
  /** Shown on the confirmation step when the submitted values were accepted */
  CONFIRMATION_PHRASE: "上記の申請内容でよろしければ、「確認」ボタンを押してください。",
  /** Caption of the receipt number on the completion page */
  RECEIPT_CAPTION: "受付番号",
  /** Link fragment that marks a CIDR block row on the resource manager page */
  CIDR_BLOCK_LINK: "entryinfo",
} as const;

// --- Checkbox Values ---
export const CHECKBOX = {
  ON: "on",
  OFF: "",
} as const;

// --- HTTP ---
export const HTTP = {
  USER_AGENT: "Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:91.0) Gecko/20100101 Firefox/91.0",
  FORM_CONTENT_TYPE: "application/x-www-form-urlencoded",
  TRANSACTION_CONTENT_TYPE: "text/html",
} as const;

// --- Result Protocol ---
export const RESULT_MARKERS = {
  RET: "RET=",
  RET_CODE: "RET_CODE=",
  RECEP_NO: "RECEP_NO=",
  ADMIN_HANDLE: "ADM_JPNIC_HDL=",
  TECH1_HANDLE: "TECH1_JPNIC_HDL=",
  TECH2_HANDLE: "TECH2_JPNIC_HDL=",
} as const;

export const RESULT_CODES = {
  OK: "00",
} as const;

// --- Error Codes ---
// Classified error types for logs and API responses.
export const ERROR_CODES = {
  CREDENTIAL_INVALID: "CREDENTIAL_INVALID",
  PORTAL_UNREACHABLE: "PORTAL_UNREACHABLE",
  ENCODING_FAILED: "ENCODING_FAILED",
  PAGE_STRUCTURE_CHANGED: "PAGE_STRUCTURE_CHANGED",
  APPLICATION_REJECTED: "APPLICATION_REJECTED",
  CANCELLED: "CANCELLED",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_CONFIGURED: "NOT_CONFIGURED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
