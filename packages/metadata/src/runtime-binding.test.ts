/**
 * Tests for runtime constructor binding
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createTypeCatalog } from "./catalog.js";
import { bindRuntimeTypes } from "./runtime-binding.js";
import { defineClass } from "./types/builders.js";

class User {
  name = "";
}

describe("Runtime binding", () => {
  it("should attach constructors to named entries", () => {
    const catalog = bindRuntimeTypes(createTypeCatalog([defineClass("User")]), {
      User,
    });

    expect(catalog.get("User")?.runtime).to.equal(User);
    expect(catalog.get("Object")?.runtime).to.equal(Object);
  });

  it("should ignore names without an entry", () => {
    const catalog = bindRuntimeTypes(createTypeCatalog([]), { User });
    expect(catalog.has("User")).to.equal(false);
  });
});
