/**
 * XML token stream types
 */

export interface XmlAttribute {
  name: string;
  value: string;
}

export interface StartElementToken {
  type: "startElement";
  name: string;
  attributes: readonly XmlAttribute[];
}

export interface CharDataToken {
  type: "charData";
  data: string;
}

export interface EndElementToken {
  type: "endElement";
  name: string;
}

export type XmlToken = StartElementToken | CharDataToken | EndElementToken;

/**
 * Consumer of XML tokens. `writeToken` may throw (I/O, balance checks);
 * the error stops the conversion and reaches the caller unchanged.
 */
export interface XmlTokenSink {
  writeToken(token: XmlToken): void;
  /** Called once after the last token of a successful conversion. */
  flush?(): void;
}

/** Receives serialized XML text. */
export interface TextOutput {
  write(text: string): void;
}
