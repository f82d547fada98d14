import { describe, expect, it } from "vitest";
import { isValidMode, isValidOwner, redactSensitiveInfo, safeRemotePath, sanitizePathComponent } from "../src/core/security.js";

describe("security helpers", () => {
  describe("path traversal prevention", () => {
    it("rejects path traversal in a path component", () => {
      expect(() => sanitizePathComponent("../../etc/passwd")).toThrow("Invalid path component");
      expect(() => sanitizePathComponent("..")).toThrow("Invalid path component");
      expect(() => sanitizePathComponent("foo/bar")).toThrow("Invalid path component");
      expect(() => sanitizePathComponent("foo\\bar")).toThrow("Invalid path component");
      expect(() => sanitizePathComponent("foo\0bar")).toThrow("Invalid path component");
    });

    it("rejects an empty component and trims a valid one", () => {
      expect(() => sanitizePathComponent("   ")).toThrow("Path component cannot be empty");
      expect(sanitizePathComponent(" misp-core ")).toBe("misp-core");
    });

    it("joins remote paths inside the base", () => {
      const base = "/var/www/MISP/app/Lib/Dashboard/Custom";
      expect(safeRemotePath(base, "IcsWidget.php")).toBe(`${base}/IcsWidget.php`);
      expect(safeRemotePath(`${base}/`, "./Sub/../IcsWidget.php")).toBe(`${base}/IcsWidget.php`);
    });

    it("rejects remote paths that leave the base", () => {
      const base = "/var/www/MISP/app/Lib/Dashboard/Custom";
      expect(() => safeRemotePath(base, "../Custom2/x.php")).toThrow("Path traversal detected: ../Custom2/x.php");
      expect(() => safeRemotePath(base, "/etc/passwd")).toThrow("Path traversal detected: /etc/passwd");
      expect(() => safeRemotePath(base, ".")).toThrow("Path traversal detected: .");
      expect(() => safeRemotePath("relative/dir", "x")).toThrow("Remote base path must be absolute: relative/dir");
    });
  });

  it("validates owners and modes", () => {
    expect(isValidOwner("www-data:www-data")).toBe(true);
    expect(isValidOwner("apache")).toBe(true);
    expect(isValidOwner("www data")).toBe(false);
    expect(isValidOwner("root;rm")).toBe(false);
    expect(isValidMode("644")).toBe(true);
    expect(isValidMode("0755")).toBe(true);
    expect(isValidMode("999")).toBe(false);
    expect(isValidMode("64")).toBe(false);
  });

  it("redacts credentials from messages", () => {
    expect(redactSensitiveInfo("password=placeholder token: abc api-key=x secret=y ok")).toBe(
      "password=*** token=*** api_key=*** secret=*** ok",
    );
    expect(redactSensitiveInfo("")).toBe("");
  });
});
