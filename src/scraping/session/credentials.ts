/**
 * Client Credentials
 *
 * Loads the PKCS#12 client bundle and the CA trust store from disk and
 * checks that they form a usable TLS identity before any request is made.
 */
import * as fs from "fs";
import * as tls from "tls";
import { CredentialError } from "../../shared/errors/portal.errors";
import { logger } from "../../monitoring/logger";

export interface ClientCredentials {
  /** PKCS#12 bundle holding the client certificate and private key */
  pfx: Buffer;
  passphrase: string;
  /** PEM trust anchors for the portal's server certificate */
  ca: Buffer;
}

export interface CredentialPaths {
  pfxPath: string;
  passphrase: string;
  caPath: string;
}

/**
 * Read the certificate bundle and CA file.
 *
 * @throws CredentialError if either file cannot be read
 */
export function loadClientCredentials(paths: CredentialPaths): ClientCredentials {
  return {
    pfx: readCredentialFile(paths.pfxPath, "client certificate bundle"),
    passphrase: paths.passphrase,
    ca: readCredentialFile(paths.caPath, "CA bundle"),
  };
}

/**
 * Decode the bundle with its passphrase and load the CA anchors.
 * Fails fast on a wrong passphrase or malformed material.
 *
 * @throws CredentialError
 */
export function verifyClientCredentials(credentials: ClientCredentials): void {
  try {
    tls.createSecureContext({
      pfx: credentials.pfx,
      passphrase: credentials.passphrase,
      ca: credentials.ca,
    });
  } catch (error) {
    throw new CredentialError(
      `Client certificate bundle could not be decoded: ${(error as Error).message}`
    );
  }
}

function readCredentialFile(filePath: string, label: string): Buffer {
  try {
    return fs.readFileSync(filePath);
  } catch (error) {
    logger.error({ filePath, error: (error as Error).message }, `Failed to read ${label}`);
    throw new CredentialError(`Failed to read ${label} at ${filePath}`);
  }
}
