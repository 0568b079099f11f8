/**
 * Tests for descriptor builders
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ctor,
  defineClass,
  defineInterface,
  field,
  method,
  primitive,
  ref,
  voidType,
} from "./builders.js";

describe("Builders", () => {
  it("should omit empty type argument lists", () => {
    expect(ref("List", [])).to.deep.equal({ kind: "referenceType", name: "List" });
    expect(ref("List", [primitive("string")]).typeArguments).to.have.length(1);
  });

  it("should default member attributes", () => {
    const m = method("getName", [], primitive("string"));
    expect(m).to.deep.equal({
      name: "getName",
      typeParameters: [],
      parameters: [],
      returnType: { kind: "primitiveType", name: "string" },
      accessibility: "public",
      isStatic: false,
      isAbstract: false,
      isBridge: false,
    });

    const f = field("count", primitive("number"), { isStatic: true });
    expect(f.isStatic).to.equal(true);
    expect(f.isReadonly).to.equal(false);
    expect(ctor()).to.deep.equal({ parameters: [], accessibility: "public" });
  });

  it("should mark interface methods abstract", () => {
    const iface = defineInterface("Named", {
      methods: [method("setName", [primitive("string")], voidType())],
    });

    expect(iface.kind).to.equal("interface");
    expect(iface.isAbstract).to.equal(true);
    expect(iface.methods[0]?.isAbstract).to.equal(true);
  });

  it("should define classes without a superclass by default", () => {
    const cls = defineClass("User");
    expect(cls.kind).to.equal("class");
    expect(cls.superclass).to.equal(undefined);
    expect(cls.constructors).to.deep.equal([]);
  });
});
