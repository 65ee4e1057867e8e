import { describe, it } from "mocha";
import { expect } from "chai";

import {
  SymbolicParameter,
  describeParam,
  expressionParam,
  floatParam,
  isParameterized,
  objectParam,
  paramEquals,
  paramsEqual,
  relativeEq,
  toParam,
  type Equatable,
} from "../../src/circuit/parameters.js";

class Token implements Equatable {
  constructor(readonly value: string) {}

  equals(other: unknown): boolean {
    return other instanceof Token && other.value === this.value;
  }

  toString(): string {
    return `Token(${this.value})`;
  }
}

describe("circuit/parameters", () => {
  describe("relativeEq", () => {
    it("accepts exact matches and differences below machine epsilon", () => {
      expect(relativeEq(0, 0, 1e-10)).to.equal(true);
      expect(relativeEq(0, 1e-17, 1e-10)).to.equal(true);
      expect(relativeEq(-0, 0, 1e-10)).to.equal(true);
    });

    it("scales the tolerance with the larger magnitude", () => {
      expect(relativeEq(1000, 1000 + 1e-8, 1e-10)).to.equal(true);
      expect(relativeEq(1000, 1000 + 1e-6, 1e-10)).to.equal(false);
      expect(relativeEq(0.1, 0.1 + 1e-12, 1e-10)).to.equal(true);
      expect(relativeEq(0.1, 0.1001, 1e-10)).to.equal(false);
    });

    it("only equates infinities and NaN with themselves", () => {
      expect(relativeEq(Infinity, Infinity, 1e-10)).to.equal(true);
      expect(relativeEq(Infinity, -Infinity, 1e-10)).to.equal(false);
      expect(relativeEq(Infinity, 1e308, 1e-10)).to.equal(false);
      expect(relativeEq(Number.NaN, Number.NaN, 1e-10)).to.equal(true);
      expect(relativeEq(Number.NaN, 1, 1e-10)).to.equal(false);
      expect(relativeEq(Infinity, Number.NaN, 1e-10)).to.equal(false);
    });
  });

  describe("toParam", () => {
    it("wraps numbers, expressions and opaque objects", () => {
      const theta = new SymbolicParameter("theta", "uuid-theta");
      const token = new Token("t");
      expect(toParam(1.5)).to.deep.equal({ kind: "float", value: 1.5 });
      expect(toParam(theta)).to.deep.equal({ kind: "expression", expression: theta });
      expect(toParam(token)).to.deep.equal({ kind: "object", value: token });
    });

    it("keeps values that are already parameters", () => {
      const param = floatParam(2);
      expect(toParam(param)).to.equal(param);
    });
  });

  describe("paramEquals", () => {
    it("compares each kind with its own rule", () => {
      expect(paramEquals(floatParam(0.5), floatParam(0.5000000000001), 1e-10)).to.equal(true);
      expect(
        paramEquals(
          expressionParam(new SymbolicParameter("a", "u1")),
          expressionParam(new SymbolicParameter("a", "u1")),
          1e-10,
        ),
      ).to.equal(true);
      expect(
        paramEquals(
          expressionParam(new SymbolicParameter("a", "u1")),
          expressionParam(new SymbolicParameter("a", "u2")),
          1e-10,
        ),
      ).to.equal(false);
      expect(paramEquals(objectParam(new Token("x")), objectParam(new Token("x")), 1e-10)).to.equal(true);
    });

    it("never equates different kinds", () => {
      expect(paramEquals(floatParam(1), objectParam(new Token("1")), 1e-10)).to.equal(false);
      expect(paramEquals(expressionParam(new SymbolicParameter("a")), floatParam(1), 1e-10)).to.equal(false);
    });
  });

  describe("paramsEqual", () => {
    it("requires equal lengths", () => {
      expect(paramsEqual([floatParam(1)], [floatParam(1), floatParam(2)], 1e-10)).to.equal(false);
      expect(paramsEqual([], [], 1e-10)).to.equal(true);
    });

    it("compares position by position", () => {
      expect(paramsEqual([floatParam(1), floatParam(2)], [floatParam(2), floatParam(1)], 1e-10)).to.equal(false);
      expect(paramsEqual([floatParam(1), floatParam(2)], [floatParam(1), floatParam(2)], 1e-10)).to.equal(true);
    });
  });

  it("detects symbolic parameters", () => {
    expect(isParameterized([floatParam(1)])).to.equal(false);
    expect(isParameterized([floatParam(1), expressionParam(new SymbolicParameter("x"))])).to.equal(true);
  });

  it("gives every symbol a fresh identity unless one is supplied", () => {
    expect(new SymbolicParameter("x").equals(new SymbolicParameter("x"))).to.equal(false);
    expect(new SymbolicParameter("x", "same").equals(new SymbolicParameter("x", "same"))).to.equal(true);
  });

  it("describes parameters", () => {
    expect(describeParam(floatParam(0.25))).to.equal("0.25");
    expect(describeParam(expressionParam(new SymbolicParameter("phi")))).to.equal("phi");
    expect(describeParam(objectParam(new Token("t")))).to.equal("Token(t)");
  });
});
