import type { XmlToken, XmlTokenSink } from "../types/xml.js";

/** Sink that keeps every token it receives, in order. */
export class TokenCollector implements XmlTokenSink {
  readonly tokens: XmlToken[] = [];

  writeToken(token: XmlToken): void {
    this.tokens.push(token);
  }

  /** Start elements received so far */
  get startCount(): number {
    return this.tokens.filter((token) => token.type === "startElement").length;
  }

  get endCount(): number {
    return this.tokens.filter((token) => token.type === "endElement").length;
  }
}
