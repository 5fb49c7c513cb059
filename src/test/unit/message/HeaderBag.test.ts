import { expect } from "chai";
import { describe, it } from "mocha";

import { HeaderBag } from "../../../message/HeaderBag.js";

describe("HeaderBag", function () {
  describe("normalize", function () {
    it("stores names lower-cased and looks them up case-insensitively", function () {
      const bag = HeaderBag.normalize({ "Content-Type": "text/html" });

      expect(bag.names()).to.deep.equal(["content-type"]);
      expect(bag.get("CONTENT-TYPE")).to.deep.equal(["text/html"]);
      expect(bag.has("content-type")).to.be.true;
    });

    it("treats differently cased inputs as equal", function () {
      const upper = HeaderBag.normalize({ "Content-Type": "text/html" });
      const lower = HeaderBag.normalize({ "content-type": "text/html" });

      expect(upper.equals(lower)).to.be.true;
      expect(upper.toRecord()).to.deep.equal(lower.toRecord());
    });

    it("preserves the order of multiple values", function () {
      const bag = HeaderBag.normalize({ "X-A": ["1", "2"] });

      expect(bag.get("x-a")).to.deep.equal(["1", "2"]);
    });

    it("coerces scalar and list values to strings", function () {
      const bag = HeaderBag.normalize({ "Content-Length": 42, "X-Flags": [true, 7] });

      expect(bag.get("content-length")).to.deep.equal(["42"]);
      expect(bag.get("x-flags")).to.deep.equal(["true", "7"]);
    });

    it("lets the later of two colliding names win", function () {
      const bag = HeaderBag.normalize({ "X-Trace": "first", "x-trace": "second" });

      expect(bag.size).to.equal(1);
      expect(bag.get("X-Trace")).to.deep.equal(["second"]);
    });

    it("keeps null and undefined values as an empty value", function () {
      const bag = HeaderBag.normalize({ Accept: "*/*", "X-Gone": null, "X-Missing": undefined });

      expect(bag.toRecord()).to.deep.equal({ accept: ["*/*"], "x-gone": [""], "x-missing": [""] });
      expect(bag.getLine("x-gone")).to.equal("");
    });

    it("is idempotent", function () {
      const once = HeaderBag.normalize({ Accept: ["text/html", "application/json"], Host: "foo.com" });
      const twice = HeaderBag.normalize(once.toRecord());

      expect(twice.equals(once)).to.be.true;
    });

    it("returns an existing bag unchanged", function () {
      const bag = HeaderBag.normalize({ Host: "foo.com" });

      expect(HeaderBag.normalize(bag)).to.equal(bag);
    });
  });

  describe("accessors", function () {
    const bag = HeaderBag.normalize({ Accept: ["text/html", "application/json"] });

    it("returns an empty list and an empty line for absent names", function () {
      expect(bag.get("x-none")).to.deep.equal([]);
      expect(bag.getLine("x-none")).to.equal("");
    });

    it("joins values with a comma in getLine", function () {
      expect(bag.getLine("accept")).to.equal("text/html, application/json");
    });

    it("hands out copies of the stored values", function () {
      const values = bag.get("accept");
      values.push("text/plain");

      expect(bag.get("accept")).to.deep.equal(["text/html", "application/json"]);
    });

    it("iterates over name/value pairs", function () {
      expect([...bag]).to.deep.equal([["accept", ["text/html", "application/json"]]]);
    });
  });

  describe("derivations", function () {
    const original = HeaderBag.normalize({ Accept: "text/html" });

    it("replaces values with `with` and leaves the original alone", function () {
      const next = original.with("ACCEPT", "application/json");

      expect(next.get("accept")).to.deep.equal(["application/json"]);
      expect(original.get("accept")).to.deep.equal(["text/html"]);
    });

    it("appends values with `withAdded`", function () {
      const next = original.withAdded("Accept", ["application/json", "text/plain"]);

      expect(next.get("accept")).to.deep.equal(["text/html", "application/json", "text/plain"]);
    });

    it("removes names with `without`", function () {
      const next = original.without("Accept");

      expect(next.size).to.equal(0);
      expect(original.size).to.equal(1);
    });

    it("returns the same bag when removing an absent name", function () {
      expect(original.without("x-none")).to.equal(original);
    });
  });

  describe("equals", function () {
    it("ignores name order", function () {
      const a = HeaderBag.normalize({ A: "1", B: "2" });
      const b = HeaderBag.normalize({ B: "2", A: "1" });

      expect(a.equals(b)).to.be.true;
    });

    it("respects value order", function () {
      const a = HeaderBag.normalize({ A: ["1", "2"] });
      const b = HeaderBag.normalize({ A: ["2", "1"] });

      expect(a.equals(b)).to.be.false;
    });
  });
});
