/**
 * XmlTextWriter - XML token sink that serializes to text
 *
 * Responsibilities:
 * - Escape char-data and attribute values
 * - Keep start and end elements balanced (throws XmlWriterError otherwise)
 * - Optional line prefix / indentation and XML declaration
 *
 * Elements are never self-closed: an empty element is written `<null></null>`.
 */

import { WRITER_INDENT, WRITER_PREFIX, WRITER_XML_DECLARATION } from "../config.js";
import { logger } from "../logging/index.js";
import { XmlWriterError } from "../types/errors.js";

import { escapeAttribute, escapeText, isXmlName } from "./xmlEscape.js";

import type { StartElementToken, TextOutput, XmlToken, XmlTokenSink } from "../types/xml.js";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export interface XmlTextWriterOptions {
  /** Destination of the text; defaults to an in-memory StringOutput */
  output?: TextOutput;
  /** Repeated once per nesting level in front of each start tag */
  indent?: string;
  /** Written at the start of every indented line */
  prefix?: string;
  /** Emit the XML declaration before the first element */
  xmlDeclaration?: boolean;
}

/**
 * In-memory text output. `take()` drains what has been written so far, which
 * lets a stream forward text chunk by chunk.
 */
export class StringOutput implements TextOutput {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  take(): string {
    const text = this.chunks.join("");
    this.chunks = [];
    return text;
  }

  toString(): string {
    return this.chunks.join("");
  }
}

export class XmlTextWriter implements XmlTokenSink {
  readonly output: TextOutput;
  private readonly indent: string;
  private readonly prefix: string;
  private readonly xmlDeclaration: boolean;
  private readonly openElements: string[] = [];
  private started = false;
  // Indentation bookkeeping: a newline is owed before the next indented line,
  // and the last thing written was a start tag.
  private putNewline = false;
  private indentedIn = false;
  private written = 0;

  constructor(options: XmlTextWriterOptions = {}) {
    this.output = options.output ?? new StringOutput();
    this.indent = options.indent ?? WRITER_INDENT;
    this.prefix = options.prefix ?? WRITER_PREFIX;
    this.xmlDeclaration = options.xmlDeclaration ?? WRITER_XML_DECLARATION;
  }

  writeToken(token: XmlToken): void {
    if (!this.started) {
      this.started = true;
      if (this.xmlDeclaration) {
        this.emit(`${XML_DECLARATION}\n`);
      }
    }

    switch (token.type) {
      case "startElement":
        this.writeStart(token);
        break;
      case "charData":
        this.emit(escapeText(token.data));
        break;
      case "endElement":
        this.writeEnd(token.name);
        break;
    }
  }

  /** Fails if any element is still open. */
  flush(): void {
    const unclosed = this.openElements[this.openElements.length - 1];
    if (unclosed !== undefined) {
      throw new XmlWriterError(`unclosed tag <${unclosed}>`);
    }
    logger.debug(`[XML WRITER] Flushed ${this.written} characters`);
  }

  /** Text written so far, when writing to the default StringOutput. */
  toString(): string {
    return this.output instanceof StringOutput ? this.output.toString() : "";
  }

  private writeStart(token: StartElementToken): void {
    if (!isXmlName(token.name)) {
      throw new XmlWriterError(`invalid element name ${JSON.stringify(token.name)}`);
    }

    this.writeIndent(1);
    let tag = `<${token.name}`;
    for (const attribute of token.attributes) {
      if (!isXmlName(attribute.name)) {
        throw new XmlWriterError(`invalid attribute name ${JSON.stringify(attribute.name)}`);
      }
      tag += ` ${attribute.name}="${escapeAttribute(attribute.value)}"`;
    }
    this.openElements.push(token.name);
    this.emit(`${tag}>`);
  }

  private writeEnd(name: string): void {
    const open = this.openElements.pop();
    if (open === undefined) {
      throw new XmlWriterError(`end tag </${name}> without start tag`);
    }
    if (open !== name) {
      throw new XmlWriterError(`end tag </${name}> does not match start tag <${open}>`);
    }

    this.writeIndent(-1);
    this.emit(`</${name}>`);
  }

  private writeIndent(depthDelta: 1 | -1): void {
    if (this.prefix === "" && this.indent === "") {
      return;
    }

    if (depthDelta < 0 && this.indentedIn) {
      // end tag right after its own start tag or text stays on the same line
      this.indentedIn = false;
      return;
    }
    this.indentedIn = false;

    if (this.putNewline) {
      this.emit("\n");
    } else {
      this.putNewline = true;
    }

    // start tags indent before the push, end tags after the pop
    this.emit(this.prefix + this.indent.repeat(this.openElements.length));

    if (depthDelta > 0) {
      this.indentedIn = true;
    }
  }

  private emit(text: string): void {
    this.written += text.length;
    this.output.write(text);
  }
}
