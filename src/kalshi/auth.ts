/**
 * Kalshi API request signing (RSA-PSS SHA256).
 */

import { createPrivateKey, sign as cryptoSign, constants, KeyObject } from "crypto";

export const AUTH_HEADERS = {
  key: "KALSHI-ACCESS-KEY",
  timestamp: "KALSHI-ACCESS-TIMESTAMP",
  signature: "KALSHI-ACCESS-SIGNATURE",
} as const;

export interface RequestSigner {
  headers(method: string, path: string, now?: number): Record<string, string>;
}

/** Path to sign: the full API path without the query string. */
export function signingPath(path: string): string {
  const q = path.indexOf("?");
  return q >= 0 ? path.slice(0, q) : path;
}

/**
 * message = timestamp + method + path (path without query), signed with
 * RSA-PSS / SHA-256 (salt length 32) and base64-encoded.
 */
export function signRequest(timestamp: string, method: string, path: string, key: KeyObject): string {
  const message = timestamp + method.toUpperCase() + signingPath(path);
  const sig = cryptoSign("sha256", Buffer.from(message, "utf8"), {
    key,
    padding: constants.RSA_PKCS1_PSS_PADDING,
    saltLength: 32,
  });
  return sig.toString("base64");
}

export function createSigner(apiKey: string, privateKeyPem: string): RequestSigner {
  const key = createPrivateKey(privateKeyPem);
  return {
    headers(method, path, now = Date.now()) {
      const timestamp = String(now);
      return {
        [AUTH_HEADERS.key]: apiKey,
        [AUTH_HEADERS.timestamp]: timestamp,
        [AUTH_HEADERS.signature]: signRequest(timestamp, method, path, key),
      };
    },
  };
}
