import { expect } from "chai";
import { describe, it } from "mocha";

import { ValidationError } from "../../../errors.js";
import { Response } from "../../../message/Response.js";
import { getReasonPhrase, hasReasonPhrase } from "../../../message/reasonPhrases.js";
import { Stream } from "../../../stream/Stream.js";

describe("Response", function () {
  describe("status code validation", function () {
    it("accepts every code from 100 to 599 and derives a non-empty phrase", function () {
      for (let code = 100; code <= 599; code++) {
        const response = new Response({ statusCode: code });
        expect(response.statusCode).to.equal(code);
        expect(response.reasonPhrase).to.not.equal("");
      }
    });

    for (const code of [0, 99, 600, 1000, -200]) {
      it(`rejects out-of-range code ${code}`, function () {
        expect(() => new Response({ statusCode: code })).to.throw(
          ValidationError,
          "Status code must be between 100 and 599",
        );
      });
    }

    it("rejects non-integer codes", function () {
      expect(() => new Response({ statusCode: 200.5 })).to.throw(
        ValidationError,
        "Status code should be an integer",
      );
      expect(() => new Response({ statusCode: Number.NaN })).to.throw(ValidationError);
    });

    it("carries the VALIDATION_ERROR code", function () {
      try {
        new Response({ statusCode: 42 });
        expect.fail("constructor should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(ValidationError);
        expect((error as ValidationError).code).to.equal("VALIDATION_ERROR");
      }
    });
  });

  describe("reason phrase", function () {
    it("derives standard phrases for known codes", function () {
      expect(new Response({ statusCode: 200 }).reasonPhrase).to.equal("OK");
      expect(new Response({ statusCode: 404 }).reasonPhrase).to.equal("Not Found");
      expect(new Response({ statusCode: 500 }).reasonPhrase).to.equal("Internal Server Error");
      expect(new Response({ statusCode: 417 }).reasonPhrase).to.equal("Expectation Failed");
    });

    it("falls back to Unknown for unlisted codes", function () {
      expect(new Response({ statusCode: 209 }).reasonPhrase).to.equal("Unknown");
      expect(new Response({ statusCode: 599 }).reasonPhrase).to.equal("Unknown");
    });

    it("keeps an explicit phrase", function () {
      const response = new Response({ statusCode: 200, reasonPhrase: "Fine" });

      expect(response.getReasonPhrase()).to.equal("Fine");
    });

    it("derives the phrase when an empty one is given", function () {
      expect(new Response({ statusCode: 201, reasonPhrase: "" }).reasonPhrase).to.equal("Created");
      expect(new Response({ statusCode: 201, reasonPhrase: null }).reasonPhrase).to.equal("Created");
    });

    it("exposes the table lookup", function () {
      expect(getReasonPhrase(511)).to.equal("Network Authentication Required");
      expect(hasReasonPhrase(511)).to.be.true;
      expect(hasReasonPhrase(509)).to.be.false;
    });
  });

  describe("message parts", function () {
    it("defaults to protocol 1.1, no headers and no body", function () {
      const response = new Response({ statusCode: 204 });

      expect(response.getProtocolVersion()).to.equal("1.1");
      expect(response.getHeaders()).to.deep.equal({});
      expect(response.getBody()).to.be.null;
    });

    it("normalizes headers", function () {
      const response = new Response({
        statusCode: 200,
        headers: { "Content-Type": "application/json", "Set-Cookie": ["a=1", "b=2"] },
      });

      expect(response.getHeaders()).to.deep.equal({
        "content-type": ["application/json"],
        "set-cookie": ["a=1", "b=2"],
      });
      expect(response.getHeaderLine("set-cookie")).to.equal("a=1, b=2");
    });

    it("rejects an empty protocol version", function () {
      expect(() => new Response({ statusCode: 200, protocolVersion: "" })).to.throw(
        ValidationError,
        "Protocol version must be a non-empty string",
      );
    });
  });

  describe("immutable derivations", function () {
    const original = new Response({ statusCode: 200, headers: { Accept: "text/html" } });

    it("withStatus re-derives the phrase", function () {
      const next = original.withStatus(404);

      expect(next.statusCode).to.equal(404);
      expect(next.reasonPhrase).to.equal("Not Found");
      expect(next.getHeader("accept")).to.deep.equal(["text/html"]);
      expect(original.statusCode).to.equal(200);
    });

    it("withStatus validates the new code", function () {
      expect(() => original.withStatus(700)).to.throw(ValidationError);
    });

    it("withHeader keeps the status line", function () {
      const next = original.withHeader("X-Trace", "abc");

      expect(next).to.not.equal(original);
      expect(next.statusCode).to.equal(200);
      expect(next.reasonPhrase).to.equal("OK");
      expect(next.getHeader("x-trace")).to.deep.equal(["abc"]);
      expect(original.hasHeader("x-trace")).to.be.false;
    });

    it("withAddedHeader and withoutHeader work on copies", function () {
      const added = original.withAddedHeader("accept", "application/json");
      const removed = added.withoutHeader("ACCEPT");

      expect(added.getHeader("accept")).to.deep.equal(["text/html", "application/json"]);
      expect(removed.hasHeader("accept")).to.be.false;
      expect(original.getHeader("accept")).to.deep.equal(["text/html"]);
    });

    it("withBody and withProtocolVersion return new responses", function () {
      const body = Stream.from("hello");
      const next = original.withBody(body).withProtocolVersion("2");

      expect(next.getBody()).to.equal(body);
      expect(next.protocolVersion).to.equal("2");
      expect(original.getBody()).to.be.null;
      expect(original.protocolVersion).to.equal("1.1");
    });
  });
});
