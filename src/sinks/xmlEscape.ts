/**
 * XML escaping for char-data and attribute values
 */

const REPLACEMENT_CHARACTER = "\uFFFD";

const NEEDS_ESCAPE = /[&<>"'\t\r\n\u0000-\u0008\u000B\u000C\u000E-\u001F\uD800-\uDFFF\uFFFE\uFFFF]/;

const ENTITIES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&#34;",
  "'": "&#39;",
  "\t": "&#x9;",
  "\r": "&#xD;",
};

/** Char ::= #x9 | #xA | #xD | [#x20-#xD7FF] | [#xE000-#xFFFD] | [#x10000-#x10FFFF] */
const isXmlChar = (codePoint: number): boolean =>
  codePoint === 0x09 ||
  codePoint === 0x0a ||
  codePoint === 0x0d ||
  (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
  (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
  (codePoint >= 0x10000 && codePoint <= 0x10ffff);

const escape = (text: string, escapeNewline: boolean): string => {
  if (!NEEDS_ESCAPE.test(text)) {
    return text;
  }

  let out = "";
  for (const char of text) {
    const entity = ENTITIES[char];
    if (entity !== undefined) {
      out += entity;
    } else if (char === "\n") {
      out += escapeNewline ? "&#xA;" : char;
    } else if (!isXmlChar(char.codePointAt(0) ?? 0)) {
      out += REPLACEMENT_CHARACTER;
    } else {
      out += char;
    }
  }
  return out;
};

/** Escapes element text. Newlines are kept as is. */
export const escapeText = (text: string): string => escape(text, false);

/** Escapes a double-quoted attribute value, including newlines. */
export const escapeAttribute = (value: string): string => escape(value, true);

const XML_NAME = /^[A-Za-z_:][-A-Za-z0-9_:.]*$/;

export const isXmlName = (name: string): boolean => XML_NAME.test(name);
