/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Server: Express API settings
 * - Portal: Registry portal endpoints
 * - Credentials: Client certificate bundle and CA trust store locations
 * - Http: Per-request timeout and redirect limits
 * - Traversal: Courtesy delay between dependent detail fetches
 * - Classifier: Optional status-text table for result codes
 * - Auth: Service-to-service authentication
 */
import dotenv from "dotenv";

dotenv.config();

const config = {
  // --- Server ---
  env: process.env.NODE_ENV || "development",
  port: parseInt(process.env.PORT || "4100", 10),
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Registry Portal ---
  portalBaseUrl: process.env.PORTAL_BASE_URL || "https://iphostmaster.nic.ad.jp",
  portalLoginPath: process.env.PORTAL_LOGIN_PATH || "/jpnic/certmemberlogin.do",
  portalTransactionUrl: process.env.PORTAL_TRANSACTION_URL || "",

  // --- Client Certificate (PKCS#12) and CA ---
  pfxPath: process.env.PORTAL_PFX_PATH || "./certs/client.p12",
  pfxPassphrase: process.env.PORTAL_PFX_PASSPHRASE || "",
  caPath: process.env.PORTAL_CA_PATH || "./certs/ca.pem",

  // --- HTTP ---
  requestTimeoutMs: parseInt(process.env.PORTAL_REQUEST_TIMEOUT_MS || "30000", 10),
  maxRedirects: parseInt(process.env.PORTAL_MAX_REDIRECTS || "5", 10),

  // --- Detail traversal ---
  detailFetchIntervalMs: parseInt(process.env.DETAIL_FETCH_INTERVAL_MS || "1000", 10),

  // --- Result code texts ---
  statusTextFile: process.env.STATUS_TEXT_FILE || "",

  // --- Service Authentication ---
  serviceSecret: process.env.SERVICE_SECRET || "change-this-to-a-strong-secret",
};

export default config;
