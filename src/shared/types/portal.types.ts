/**
 * Portal Types
 *
 * Shapes of the records extracted from the registry portal and of the
 * inputs accepted by each workflow. Field values stay as the portal prints
 * them (dates, sizes and codes are strings); only usage ratios are numeric.
 */

/** "used/total" address counts with the utilization percentage */
export interface UsageRatio {
  used: number;
  total: number;
  percent: number;
}

/**
 * One row of the IPv4 registration listing.
 */
export interface Ipv4Registration {
  ipAddress: string;
  size: string;
  networkName: string;
  assignDate: string;
  returnDate: string;
  orgName: string;
  /** Resource manager short name */
  shortName: string;
  recepNo: string;
  deliNo: string;
  type: string;
  kindId: string;
  /** Link to the registration detail page */
  detailLink: string;
  detail?: RegistrationDetail;
}

/**
 * One row of the IPv6 registration listing.
 */
export interface Ipv6Registration {
  ipAddress: string;
  networkName: string;
  assignDate: string;
  returnDate: string;
  orgName: string;
  shortName: string;
  recepNo: string;
  deliNo: string;
  kindId: string;
  detailLink: string;
  detail?: RegistrationDetail;
}

/**
 * Registration detail page, reached from a listing row.
 */
export interface RegistrationDetail {
  ipAddress: string;
  shortName: string;
  type: string;
  infraUserKind: string;
  networkName: string;
  org: string;
  orgEn: string;
  postCode: string;
  address: string;
  addressEn: string;
  adminHandle: string;
  adminHandleLink: string;
  techHandle: string;
  techHandleLink: string;
  nameServer: string;
  dsRecord: string;
  notifyAddress: string;
  deliNo: string;
  recepNo: string;
  assignDate: string;
  returnDate: string;
  updateDate: string;
}

/**
 * Contact (person handle) or group (group handle) record.
 */
export interface HandleDetail {
  /** true for a person handle, false for a group handle */
  isPersonHandle: boolean;
  handle: string;
  org: string;
  orgEn: string;
  email: string;
  division: string;
  divisionEn: string;
  title: string;
  titleEn: string;
  tel: string;
  fax: string;
  notifyAddress: string;
  updateDate: string;
}

export interface ResourceManagerInfo {
  resourceManagerNo: string;
  shortName: string;
  org: string;
  orgEn: string;
  zipCode: string;
  address: string;
  addressEn: string;
  tel: string;
  fax: string;
  resourceManagementManager: string;
  contactPerson: string;
  inquiry: string;
  notifyMail: string;
  assignmentWindowSize: string;
  managementStartDate: string;
  managementEndDate: string;
  updateDate: string;
}

export interface ResourceCidrBlock {
  address: string;
  url: string;
  assignDate: string;
  usage: UsageRatio;
}

/**
 * Resource manager summary: manager record, overall utilization and blocks.
 */
export interface ResourceSummary {
  manager: ResourceManagerInfo;
  usage?: UsageRatio;
  adRatio?: number;
  cidrBlocks: ResourceCidrBlock[];
}

/**
 * One row of the request (application) list.
 */
export interface RequestEntry {
  recepNo: string;
  deliNo: string;
  applyKind: string;
  applyClass: string;
  applicant: string;
  applyDate: string;
  completeDate: string;
  status: string;
}

/** A classified result code */
export interface ClassifiedError {
  code: string;
  message: string;
}

/** One decoded RET_CODE composite that carried an error */
export interface InterfaceError {
  /** The raw composite value */
  retCode: string;
  interfaceCode: string;
  genreCode: string;
  message: string;
}

/**
 * Decoded control response of a transactional endpoint.
 */
export interface ResultOutcome {
  recepNo?: string;
  adminHandle?: string;
  tech1Handle?: string;
  tech2Handle?: string;
  /** "00" when the request was accepted */
  overallCode: string;
  topLevelError?: ClassifiedError;
  interfaceErrors: InterfaceError[];
}

// --- Workflow inputs ---

export interface Ipv6SearchCriteria {
  ipAddress: string;
  sizeStart: string;
  sizeEnd: string;
  networkName: string;
  regStart: string;
  regEnd: string;
  returnStart: string;
  returnEnd: string;
  org: string;
  /** Resource manager short name, used unless `myself` is set */
  shortName: string;
  recepNo: string;
  deliNo: string;
  isAllocate: boolean;
  isAssignInfra: boolean;
  isAssignUser: boolean;
  isSubAllocate: boolean;
  /** Search the operator's own registrations (short name read from the form) */
  myself: boolean;
  /** Follow each row's detail page and its contact handles */
  includeDetail: boolean;
  /** Handles the caller already holds; never fetched during traversal */
  knownHandles: string[];
}

export interface Ipv4SearchCriteria extends Ipv6SearchCriteria {
  isPA: boolean;
  isHistoricalPI: boolean;
  isSpecialPI: boolean;
}

export interface ContactChangeInput {
  /** true: person handle, false: group handle */
  isPersonHandle: boolean;
  handle: string;
  name: string;
  nameEn: string;
  email: string;
  org: string;
  orgEn: string;
  zipCode: string;
  address: string;
  addressEn: string;
  division: string;
  divisionEn: string;
  title: string;
  titleEn: string;
  tel: string;
  fax: string;
  notifyMail: string;
  /** Applicant address, also sent as its confirmation */
  applyMail: string;
}

/** Ordered KEY=VALUE fields of a transactional request */
export interface WebTransaction {
  fields: Array<{ key: string; value: string }>;
}

export interface SearchResult<T> {
  records: T[];
  handles: HandleDetail[];
}
