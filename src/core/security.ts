import path from "node:path";

/**
 * Sanitize path component to prevent path traversal attacks.
 * @throws Error if path component is invalid
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  // Reject path traversal attempts
  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Join a relative path onto a remote (POSIX) base directory, refusing anything
 * that would land outside it.
 * @throws Error if path traversal is detected
 */
export function safeRemotePath(base: string, relative: string): string {
  if (!path.posix.isAbsolute(base)) {
    throw new Error(`Remote base path must be absolute: ${base}`);
  }
  if (relative.includes("\0")) {
    throw new Error(`Invalid remote path: ${relative}`);
  }

  const normalizedBase = path.posix.normalize(base).replace(/\/+$/, "") || "/";
  const fullPath = path.posix.resolve(normalizedBase, relative);

  if (!fullPath.startsWith(normalizedBase === "/" ? "/" : normalizedBase + "/")) {
    throw new Error(`Path traversal detected: ${relative}`);
  }

  return fullPath;
}

const OWNER_RE = /^[a-z_][a-z0-9_-]*[$]?(:[a-z_][a-z0-9_-]*[$]?)?$/i;
const MODE_RE = /^[0-7]{3,4}$/;

export function isValidOwner(owner: string): boolean {
  return OWNER_RE.test(owner);
}

export function isValidMode(mode: string): boolean {
  return MODE_RE.test(mode);
}

/**
 * Redact sensitive information from error messages.
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;

  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");

  return result;
}
