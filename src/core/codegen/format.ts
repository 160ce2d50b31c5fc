// src/core/codegen/format.ts
// Source text helpers shared by the backends: indentation and string literals.

/* =============================================================================
 * INDENTATION
 * ============================================================================= */

/** Indent all non-empty lines of a string. */
export function indent(text: string, indentStr = "  ", levels = 1): string {
  const prefix = indentStr.repeat(levels);
  return text
    .split("\n")
    .map(line => (line.length > 0 ? prefix + line : line))
    .join("\n");
}

/* =============================================================================
 * STRING LITERALS
 * ============================================================================= */

/** JavaScript / AssemblyScript string literal. */
export function quoteJs(s: string): string {
  return JSON.stringify(s).replace(/\u2028/g, "\\u2028").replace(/\u2029/g, "\\u2029");
}

const COMMON_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * C++ narrow literal holding UTF-8. Bytes outside printable ASCII use
 * three-digit octal escapes, which cannot run into a following character.
 */
export function quoteCpp(s: string): string {
  let out = '"';
  for (const byte of Buffer.from(s, "utf8")) {
    const ch = String.fromCharCode(byte);
    const esc = COMMON_ESCAPES[ch];
    if (esc !== undefined) out += esc;
    else if (byte < 0x20 || byte >= 0x7f || ch === "?") out += "\\" + byte.toString(8).padStart(3, "0");
    else out += ch;
  }
  return out + '"';
}

/** Go interpreted string literal. */
export function quoteGo(s: string): string {
  let out = '"';
  for (const ch of s) {
    const esc = COMMON_ESCAPES[ch];
    const code = ch.codePointAt(0) ?? 0;
    if (esc !== undefined) out += esc;
    else if (code < 0x20 || code === 0x7f) out += "\\x" + code.toString(16).padStart(2, "0");
    else if (code === 0x2028 || code === 0x2029 || code === 0xfeff) out += "\\u" + code.toString(16).padStart(4, "0");
    else out += ch;
  }
  return out + '"';
}

/** Rust string literal. */
export function quoteRust(s: string): string {
  let out = '"';
  for (const ch of s) {
    const esc = COMMON_ESCAPES[ch];
    const code = ch.codePointAt(0) ?? 0;
    if (esc !== undefined) out += esc;
    else if (code < 0x20 || code === 0x7f) out += `\\u{${code.toString(16)}}`;
    else out += ch;
  }
  return out + '"';
}

/** Python str literal. Lone surrogates cannot be written as UTF-8 source, so they are escaped. */
export function quotePython(s: string): string {
  let out = '"';
  for (const ch of s) {
    const esc = COMMON_ESCAPES[ch];
    const code = ch.codePointAt(0) ?? 0;
    if (esc !== undefined) out += esc;
    else if (code < 0x20 || code === 0x7f) out += "\\x" + code.toString(16).padStart(2, "0");
    else if (code >= 0xd800 && code <= 0xdfff) out += "\\u" + code.toString(16);
    else out += ch;
  }
  return out + '"';
}

/** Shortest decimal text of a finite float that still reads as a float literal. */
export function floatLiteral(n: number): string {
  if (Object.is(n, -0)) return "-0.0";
  const text = String(n);
  return /[.e]/.test(text) ? text : `${text}.0`;
}
