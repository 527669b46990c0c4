import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CookieFileGate } from "../../src/services/business/credentialService.js";

describe("CookieFileGate", () => {
  let dir: string;
  let cookieFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vidgrab-cookies-"));
    cookieFile = path.join(dir, "cookies.txt");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects a missing file", () => {
    expect(new CookieFileGate(cookieFile).isAuthenticated()).toBe(false);
  });

  it("rejects an empty file", () => {
    fs.writeFileSync(cookieFile, "");
    expect(new CookieFileGate(cookieFile).isAuthenticated()).toBe(false);
  });

  it("rejects a directory", () => {
    fs.mkdirSync(cookieFile);
    expect(new CookieFileGate(cookieFile).isAuthenticated()).toBe(false);
  });

  it("accepts a non-empty file", () => {
    fs.writeFileSync(cookieFile, "# Netscape HTTP Cookie File\n");
    expect(new CookieFileGate(cookieFile).isAuthenticated()).toBe(true);
  });

  it("re-checks the file on every call", () => {
    const gate = new CookieFileGate(cookieFile);
    expect(gate.isAuthenticated()).toBe(false);

    fs.writeFileSync(cookieFile, "test-cookie\n");
    expect(gate.isAuthenticated()).toBe(true);

    fs.truncateSync(cookieFile, 0);
    expect(gate.isAuthenticated()).toBe(false);
  });
});
