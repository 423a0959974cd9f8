import { expect } from "chai";
import { describe, it } from "mocha";

import { Converter } from "../../../converter/Converter.js";
import { JsonTokens as T } from "../../../sources/jsonTokens.js";
import { ValueTokenSource } from "../../../sources/ValueTokenSource.js";
import {
  ConversionError,
  InvalidKeyError,
  InvalidTokenError,
  MaxDepthExceededError,
  UnexpectedEndError,
  UnknownTokenError,
} from "../../../types/errors.js";
import { END_OF_STREAM } from "../../../types/json.js";
import {
  CountingSource,
  LooseSource,
  convertTokens,
  convertUntilError,
  converterFor,
  describeXmlToken,
} from "../../utils/testHelpers.js";

import type { JsonValue } from "../../../types/json.js";
import type { XmlToken } from "../../../types/xml.js";

describe("Converter", function () {
  describe("containers", function () {
    it("should convert an empty object", function () {
      expect(convertTokens([T.objectStart(), T.objectEnd()])).to.deep.equal(["<object>", "</object>"]);
    });

    it("should convert an empty array", function () {
      expect(convertTokens([T.arrayStart(), T.arrayEnd()])).to.deep.equal(["<array>", "</array>"]);
    });

    it("should give object members a name attribute on the immediate child only", function () {
      const tokens = [
        T.objectStart(),
        T.key("Location"),
        T.objectStart(),
        T.key("Longitude"),
        T.number(-1.8262),
        T.key("Latitude"),
        T.number(51.1789),
        T.objectEnd(),
        T.objectEnd(),
      ];

      expect(convertTokens(tokens)).to.deep.equal([
        "<object>",
        '<object name="Location">',
        '<number name="Longitude">',
        "text:-1.8262",
        "</number>",
        '<number name="Latitude">',
        "text:51.1789",
        "</number>",
        "</object>",
        "</object>",
      ]);
    });

    it("should not name array items", function () {
      const tokens = [
        T.objectStart(),
        T.key("list"),
        T.arrayStart(),
        T.number(1),
        T.string("a"),
        T.null(),
        T.boolean(false),
        T.arrayEnd(),
        T.objectEnd(),
      ];

      expect(convertTokens(tokens)).to.deep.equal([
        "<object>",
        '<array name="list">',
        "<number>",
        "text:1",
        "</number>",
        "<string>",
        "text:a",
        "</string>",
        "<null>",
        "</null>",
        "<boolean>",
        "text:false",
        "</boolean>",
        "</array>",
        "</object>",
      ]);
    });

    it("should pass member keys through verbatim", function () {
      const tokens = [T.objectStart(), T.key("a <b> & \"c\""), T.string("x"), T.objectEnd()];
      const [, start] = [...converterFor(tokens)];

      expect(start).to.deep.equal({
        type: "startElement",
        name: "string",
        attributes: [{ name: "name", value: "a <b> & \"c\"" }],
      });
    });

    it("should accept an empty key", function () {
      const tokens = [T.objectStart(), T.key(""), T.null(), T.objectEnd()];
      expect(convertTokens(tokens)).to.deep.equal(["<object>", '<null name="">', "</null>", "</object>"]);
    });
  });

  describe("scalars", function () {
    it("should emit exactly three tokens for a lone boolean", function () {
      expect(convertTokens([T.boolean(true)])).to.deep.equal(["<boolean>", "text:true", "</boolean>"]);
    });

    it("should emit exactly two tokens for null", function () {
      expect(convertTokens([T.null()])).to.deep.equal(["<null>", "</null>"]);
    });

    it("should emit char-data for an empty string", function () {
      expect(convertTokens([T.string("")])).to.deep.equal(["<string>", "text:", "</string>"]);
    });

    it("should keep raw string content as char-data", function () {
      expect(convertTokens([T.string("a<b & c")])).to.deep.equal(["<string>", "text:a<b & c", "</string>"]);
    });

    it("should pass number literals through unchanged", function () {
      expect(convertTokens([T.numberLiteral("1.50")])).to.deep.equal(["<number>", "text:1.50", "</number>"]);
      expect(convertTokens([T.numberLiteral("12345678901234567890")])).to.deep.equal([
        "<number>",
        "text:12345678901234567890",
        "</number>",
      ]);
      expect(convertTokens([T.numberLiteral("1e400")])).to.deep.equal(["<number>", "text:1e400", "</number>"]);
    });

    it("should format floats without exponent notation", function () {
      expect(convertTokens([T.number(1e21)])).to.deep.equal([
        "<number>",
        "text:1000000000000000000000",
        "</number>",
      ]);
      expect(convertTokens([T.number(0.0000015)])).to.deep.equal(["<number>", "text:0.0000015", "</number>"]);
    });
  });

  describe("state machine", function () {
    it("should move through pending data and awaiting close for a scalar", function () {
      const converter = converterFor([T.boolean(true)]);
      expect(converter.state).to.equal("idle");

      converter.nextToken();
      expect(converter.state).to.equal("hasPendingData");
      expect(converter.depth).to.equal(1);

      converter.nextToken();
      expect(converter.state).to.equal("awaitingClose");

      converter.nextToken();
      expect(converter.state).to.equal("idle");
      expect(converter.depth).to.equal(0);

      expect(converter.nextToken()).to.equal(END_OF_STREAM);
    });

    it("should skip pending data for null", function () {
      const converter = converterFor([T.null()]);
      converter.nextToken();
      expect(converter.state).to.equal("awaitingClose");
    });

    it("should pull a key and its value in the same call", function () {
      const source = new CountingSource([T.objectStart(), T.key("a"), T.boolean(true), T.objectEnd()]);
      const converter = new Converter(source);

      converter.nextToken();
      expect(source.pulls).to.equal(1);
      converter.nextToken();
      expect(source.pulls).to.equal(3);
      converter.nextToken();
      converter.nextToken();
      expect(source.pulls).to.equal(3);
      converter.nextToken();
      expect(source.pulls).to.equal(4);
      expect(converter.nextToken()).to.equal(END_OF_STREAM);
      expect(source.pulls).to.equal(5);
    });

    it("should keep returning end of stream once finished", function () {
      const converter = converterFor([T.null()]);
      expect([...converter]).to.have.length(2);
      expect(converter.nextToken()).to.equal(END_OF_STREAM);
      expect(converter.nextToken()).to.equal(END_OF_STREAM);
    });

    it("should balance start and end elements in LIFO order", function () {
      const value: JsonValue = {
        id: 7,
        tags: ["a", ["b", { deep: [null, true] }]],
        meta: { empty: {}, list: [] },
      };
      const converter = new Converter(new ValueTokenSource(value));
      const open: string[] = [];
      let starts = 0;
      let ends = 0;

      for (const token of converter) {
        if (token.type === "startElement") {
          starts++;
          open.push(token.name);
        } else if (token.type === "endElement") {
          ends++;
          expect(token.name).to.equal(open.pop());
        }
      }

      expect(open).to.be.empty;
      expect(starts).to.equal(ends);
      expect(starts).to.equal(13);
    });
  });

  describe("errors", function () {
    it("should reject an array close while an object is open", function () {
      const { emitted, error } = convertUntilError([T.objectStart(), T.arrayEnd(), T.objectEnd()]);

      expect(emitted).to.deep.equal(["<object>"]);
      expect(error).to.be.instanceOf(InvalidTokenError);
      expect((error as InvalidTokenError).code).to.equal("INVALID_TOKEN");
    });

    it("should reject a close token in place of a member value", function () {
      const { emitted, error } = convertUntilError([T.objectStart(), T.key("a"), T.arrayEnd()]);

      expect(emitted).to.deep.equal(["<object>"]);
      expect(error).to.be.instanceOf(InvalidTokenError);
      expect((error as Error).message).to.equal(
        "invalid token: ']' where the value of member \"a\" was expected",
      );
    });

    it("should reject an object close while an array is open", function () {
      const { emitted, error } = convertUntilError([T.arrayStart(), T.objectEnd()]);

      expect(emitted).to.deep.equal(["<array>"]);
      expect((error as Error).message).to.equal("invalid token: '}' does not close the open array");
    });

    it("should reject a close token with nothing open", function () {
      const { emitted, error } = convertUntilError([T.objectEnd()]);

      expect(emitted).to.be.empty;
      expect((error as Error).message).to.equal("invalid token: '}' with no open container");
    });

    it("should reject a non-string member key", function () {
      const { emitted, error } = convertUntilError([T.objectStart(), T.number(1), T.string("x"), T.objectEnd()]);

      expect(emitted).to.deep.equal(["<object>"]);
      expect(error).to.be.instanceOf(InvalidKeyError);
      expect((error as InvalidKeyError).code).to.equal("INVALID_KEY");
      expect((error as Error).message).to.equal("invalid key type: expected string, found number 1");
    });

    it("should reject a container where a member key belongs", function () {
      const { error } = convertUntilError([T.objectStart(), T.objectStart()]);
      expect((error as Error).message).to.equal("invalid key type: expected string, found '{'");
    });

    it("should reject unknown token shapes", function () {
      const converter = new Converter(new LooseSource([{ type: "comment", text: "x" }]));

      expect(() => converter.nextToken()).to.throw(UnknownTokenError, 'unknown token type: token type "comment"');
    });

    it("should reject tokens with a known type but the wrong payload", function () {
      const converter = new Converter(new LooseSource([{ type: "string", value: 3 }]));
      expect(() => converter.nextToken()).to.throw(UnknownTokenError);
    });

    it("should reject values that are not tokens at all", function () {
      const converter = new Converter(new LooseSource(["raw"]));
      expect(() => converter.nextToken()).to.throw(UnknownTokenError, "unknown token type: string");
    });

    it("should reject non-finite floats", function () {
      const { error } = convertUntilError([T.number(Number.NaN)]);
      expect(error).to.be.instanceOf(UnknownTokenError);
      expect((error as Error).message).to.equal("unknown token type: number NaN");
    });

    it("should report a stream that ends inside a container", function () {
      const { emitted, error } = convertUntilError([T.arrayStart(), T.number(1)]);

      expect(emitted).to.deep.equal(["<array>", "<number>", "text:1", "</number>"]);
      expect(error).to.be.instanceOf(UnexpectedEndError);
      expect((error as Error).message).to.equal(
        "unexpected end of token stream: 1 unclosed element(s), innermost array",
      );
    });

    it("should report a stream that ends between a key and its value", function () {
      const { error } = convertUntilError([T.objectStart(), T.key("a")]);
      expect((error as Error).message).to.equal('unexpected end of token stream: missing value for member "a"');
    });

    it("should enforce the maximum depth", function () {
      const converter = converterFor([T.arrayStart(), T.arrayStart(), T.arrayStart()], { maxDepth: 2 });
      const emitted: XmlToken[] = [converter.nextToken(), converter.nextToken()].filter(
        (token): token is XmlToken => token !== END_OF_STREAM,
      );

      expect(emitted.map(describeXmlToken)).to.deep.equal(["<array>", "<array>"]);
      expect(() => converter.nextToken()).to.throw(MaxDepthExceededError, "nesting exceeds the maximum depth of 2");
    });

    it("should refuse a maxDepth that is not a positive integer", function () {
      for (const maxDepth of [Number.NaN, 0, -1, 1.5]) {
        expect(() => converterFor([T.null()], { maxDepth }), String(maxDepth)).to.throw(
          RangeError,
          `maxDepth must be a positive integer. Got: ${String(maxDepth)}`,
        );
      }
    });

    it("should let source errors through unchanged", function () {
      const failure = new Error("disk read failed");
      const converter = new Converter({
        next: () => {
          throw failure;
        },
      });

      try {
        converter.nextToken();
        expect.fail("nextToken should have thrown");
      } catch (error: unknown) {
        expect(error).to.equal(failure);
        expect(error).not.to.be.instanceOf(ConversionError);
      }
    });
  });
});
