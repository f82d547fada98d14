import path from "node:path";
import { scanPhp } from "./php.js";

export type SourceLanguage = "php" | "json" | "text";

export type SyntaxDiagnostic = {
  line: number;
  column: number;
  message: string;
};

export type ValidationResult = { valid: true } | { valid: false; diagnostics: SyntaxDiagnostic[] };

const EXTENSIONS: Record<string, SourceLanguage> = {
  ".php": "php",
  ".phtml": "php",
  ".ctp": "php",
  ".inc": "php",
  ".json": "json",
};

export function languageForPath(filePath: string): SourceLanguage {
  return EXTENSIONS[path.posix.extname(filePath).toLowerCase()] ?? "text";
}

/**
 * Syntax-only check of a source artifact. Pure: never executes the source,
 * never leaves the process.
 */
export function validate(source: string, language: SourceLanguage): ValidationResult {
  const diagnostics = diagnose(source, language);
  return diagnostics.length === 0 ? { valid: true } : { valid: false, diagnostics };
}

function diagnose(source: string, language: SourceLanguage): SyntaxDiagnostic[] {
  switch (language) {
    case "php":
      return scanPhp(source);
    case "json":
      return checkJson(source);
    case "text":
      return [];
  }
}

function checkJson(source: string): SyntaxDiagnostic[] {
  try {
    JSON.parse(source);
    return [];
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const pos = /position (\d+)/.exec(message);
    const offset = pos ? Number(pos[1]) : 0;
    const before = source.slice(0, offset);
    const line = before.split("\n").length;
    const column = offset - before.lastIndexOf("\n");
    return [{ line, column, message }];
  }
}

export function formatDiagnostics(diagnostics: readonly SyntaxDiagnostic[]): string {
  return diagnostics.map((d) => `line ${d.line}:${d.column}: ${d.message}`).join("; ");
}
