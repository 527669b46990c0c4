/**
 * Credential Service
 * Checks the operator-supplied cookie file before authenticated extraction.
 */

import fs from "fs";

export interface CredentialGate {
  /** Path handed to the extractor when authenticated. */
  readonly cookieFile: string;
  /** True iff the cookie file exists and is non-empty. Re-checked on every call. */
  isAuthenticated(): boolean;
}

/**
 * Cookie-file gate. The file is maintained out of band and may appear,
 * change or vanish while the process runs, so nothing is cached.
 */
export class CookieFileGate implements CredentialGate {
  constructor(readonly cookieFile: string) {}

  isAuthenticated(): boolean {
    try {
      const stats = fs.statSync(this.cookieFile);
      return stats.isFile() && stats.size > 0;
    } catch {
      return false;
    }
  }
}
