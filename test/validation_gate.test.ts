import { describe, expect, it } from "vitest";
import { formatDiagnostics, languageForPath, validate } from "../src/validation/gate.js";

const VALID_WIDGET = `<?php
class IcsWidget
{
    public $title = 'ICS activity';

    public function handler($user, $options = array())
    {
        $tags = array('ics:%');
        return ["tags" => $tags, "label" => "ICS {$user['name']}"];
    }
}
`;

describe("validation gate", () => {
  describe("php", () => {
    it("accepts a well-formed widget", () => {
      expect(validate(VALID_WIDGET, "php")).toEqual({ valid: true });
    });

    it("reports an unclosed brace at its position", () => {
      const res = validate("<?php\nfunction f() {\n  return 1;\n", "php");
      expect(res).toEqual({ valid: false, diagnostics: [{ line: 2, column: 14, message: "unclosed '{'" }] });
    });

    it("reports a mismatched closer with the opener's position", () => {
      const res = validate("<?php\n$a = [1, 2);\n", "php");
      expect(res).toEqual({
        valid: false,
        diagnostics: [{ line: 2, column: 11, message: "unexpected ')', expecting ']' to close '[' opened at 2:6" }],
      });
    });

    it("reports an unterminated string", () => {
      const res = validate("<?php\n$x = 'ics:;\n", "php");
      expect(res).toEqual({ valid: false, diagnostics: [{ line: 2, column: 6, message: "unterminated single-quoted string" }] });
    });

    it("ignores brackets inside comments, strings and inline HTML", () => {
      expect(validate("<?php\n// {\n# }\n/* ( */\necho '[';\n", "php").valid).toBe(true);
      expect(validate("<div>{</div>\n<?php echo 1; ?>\n<p>}</p>", "php").valid).toBe(true);
      expect(validate('<?php\n$a = "x {$arr[\'k\']} y";\n', "php").valid).toBe(true);
    });

    it("handles heredocs and attributes", () => {
      expect(validate("<?php\n$s = <<<EOT\n{ unbalanced (\nEOT;\n", "php").valid).toBe(true);
      expect(validate("<?php\n#[Attr]\nclass A {}\n", "php").valid).toBe(true);
      expect(validate("<?php\n$s = <<<EOT\nabc\n", "php")).toEqual({
        valid: false,
        diagnostics: [{ line: 2, column: 6, message: "unterminated heredoc 'EOT'" }],
      });
    });

    it("reports an unterminated block comment", () => {
      const res = validate("<?php\n/* open\n", "php");
      expect(res).toEqual({ valid: false, diagnostics: [{ line: 2, column: 1, message: "unterminated block comment" }] });
    });
  });

  it("checks json with a position", () => {
    expect(validate('{"a": 1}', "json")).toEqual({ valid: true });
    const res = validate('{"a": 1,}', "json");
    expect(res.valid).toBe(false);
    if (!res.valid) {
      expect(res.diagnostics[0].line).toBe(1);
      expect(res.diagnostics[0].column).toBe(9);
    }
  });

  it("accepts any text", () => {
    expect(validate("{{{ (", "text")).toEqual({ valid: true });
  });

  it("infers the language from the extension", () => {
    expect(languageForPath("/var/www/Custom/FooWidget.php")).toBe("php");
    expect(languageForPath("layout.ctp")).toBe("php");
    expect(languageForPath("dashboard.JSON")).toBe("json");
    expect(languageForPath("README")).toBe("text");
  });

  it("formats diagnostics on one line", () => {
    expect(
      formatDiagnostics([
        { line: 2, column: 14, message: "unclosed '{'" },
        { line: 3, column: 1, message: "unexpected ')'" },
      ]),
    ).toBe("line 2:14: unclosed '{'; line 3:1: unexpected ')'");
  });
});
