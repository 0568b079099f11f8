/**
 * Tests for accessor naming rules
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  isGetterName,
  isSetterName,
  isValidPropertyName,
  methodToProperty,
} from "./property-namer.js";

describe("Property namer", () => {
  describe("methodToProperty", () => {
    it("should decapitalize a mixed-case remainder", () => {
      expect(methodToProperty("getId")).to.equal("id");
      expect(methodToProperty("setFirstName")).to.equal("firstName");
      expect(methodToProperty("isActive")).to.equal("active");
    });

    it("should keep an acronym remainder as is", () => {
      expect(methodToProperty("getURL")).to.equal("URL");
      expect(methodToProperty("setIDCard")).to.equal("IDCard");
    });

    it("should lower-case a single character remainder", () => {
      expect(methodToProperty("getX")).to.equal("x");
    });

    it("should return undefined without an accessor prefix", () => {
      expect(methodToProperty("toString")).to.equal(undefined);
    });
  });

  describe("isGetterName", () => {
    it("should accept get-prefixed names longer than the prefix", () => {
      expect(isGetterName("getName", false)).to.equal(true);
      expect(isGetterName("get", false)).to.equal(false);
    });

    it("should accept is-prefixed names only for boolean returns", () => {
      expect(isGetterName("isOpen", true)).to.equal(true);
      expect(isGetterName("isOpen", false)).to.equal(false);
      expect(isGetterName("is", true)).to.equal(false);
    });
  });

  describe("isSetterName", () => {
    it("should accept set-prefixed names longer than the prefix", () => {
      expect(isSetterName("setName")).to.equal(true);
      expect(isSetterName("set")).to.equal(false);
      expect(isSetterName("reset")).to.equal(false);
    });
  });

  describe("isValidPropertyName", () => {
    it("should reject reserved and internal names", () => {
      expect(isValidPropertyName("class")).to.equal(false);
      expect(isValidPropertyName("serialVersionUID")).to.equal(false);
      expect(isValidPropertyName("$coverage")).to.equal(false);
    });

    it("should accept ordinary names", () => {
      expect(isValidPropertyName("name")).to.equal(true);
      expect(isValidPropertyName("className")).to.equal(true);
    });
  });
});
