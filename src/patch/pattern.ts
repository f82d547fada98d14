import { ConfigurationError, errorMessage } from "../errors.js";
import type { CompiledPattern, MatchPattern } from "../types/patch.js";

/**
 * Compile a declared match pattern.
 *
 * Literal patterns replace every occurrence verbatim; the replacement text is
 * never interpreted. Regex patterns replace every match and honour `$1`-style
 * group references in the replacement.
 */
export function compilePattern(pattern: MatchPattern, ruleId: string): CompiledPattern {
  if ("literal" in pattern) {
    const literal = pattern.literal;
    return {
      source: literal,
      test: (text) => text.includes(literal),
      replace: (text, replacement) => text.split(literal).join(replacement),
    };
  }

  const flags = (pattern.flags ?? "").replace(/g/g, "");
  let probe: RegExp;
  try {
    probe = new RegExp(pattern.regex, flags);
  } catch (e) {
    throw new ConfigurationError(`Rule ${ruleId} has an invalid regex: ${errorMessage(e)}`, { rule: ruleId });
  }

  return {
    source: probe.source,
    test: (text) => new RegExp(probe.source, flags).test(text),
    replace: (text, replacement) => text.replace(new RegExp(probe.source, flags + "g"), replacement),
  };
}
