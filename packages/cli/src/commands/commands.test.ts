/**
 * Tests for inspect, list and check commands
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createTypeCatalog,
  ctor,
  defineClass,
  defineInterface,
  field,
  method,
  primitive,
  voidType,
} from "@proplens/metadata";
import { formatTypeReport, inspectCommand } from "./inspect.js";
import { formatTypeList, listCommand } from "./list.js";
import { checkCommand, formatAmbiguities } from "./check.js";

const account = defineClass("Account", {
  fields: [
    field("owner", primitive("string"), { accessibility: "private" }),
    field("balance", primitive("number")),
  ],
  methods: [
    method("getOwner", [], primitive("string")),
    method("setOwner", [primitive("string")], voidType()),
    method("isOpen", [], primitive("boolean")),
  ],
  constructors: [ctor()],
});

const bean = defineClass("Bean", {
  methods: [
    method("setValue", [primitive("string")], voidType()),
    method("setValue", [primitive("number")], voidType()),
  ],
});

const named = defineInterface("Named", {
  methods: [method("getName", [], primitive("string"))],
});

const catalog = createTypeCatalog([named, account, bean]);

describe("Commands", () => {
  describe("inspect", () => {
    it("should report every property side", () => {
      const result = inspectCommand(catalog, "Account", false);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(formatTypeReport(result.value)).to.equal(
        [
          "class Account",
          "  default constructor: yes",
          "  get owner: string  [method Account.getOwner(): string]",
          "  set owner: string  [method Account.setOwner(string): void]",
          "  get open: boolean  [method Account.isOpen(): boolean]",
          "  get balance: number  [field Account.balance (read): number]",
          "  set balance: number  [field Account.balance (write): number]",
        ].join("\n")
      );
    });

    it("should flag ambiguous sides", () => {
      const result = inspectCommand(catalog, "Bean", false);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.hasDefaultConstructor).to.equal(false);
      expect(result.value.properties).to.deep.equal([
        {
          name: "value",
          getter: undefined,
          setter: {
            type: "string",
            invoker: "ambiguous (string | number) declared by Bean",
            ambiguous: true,
          },
        },
      ]);
    });

    it("should fail for unknown types", () => {
      expect(inspectCommand(catalog, "Missing", false)).to.deep.equal({
        ok: false,
        error: "Type not found: Missing",
      });
    });
  });

  describe("list", () => {
    it("should list catalog types without the root type", () => {
      const types = listCommand(catalog);
      expect(types).to.deep.equal([
        { name: "Named", kind: "interface" },
        { name: "Account", kind: "class" },
        { name: "Bean", kind: "class" },
      ]);
      expect(formatTypeList(types)).to.equal(
        "interface Named\nclass Account\nclass Bean"
      );
    });
  });

  describe("check", () => {
    it("should report ambiguous accessors", () => {
      const ambiguities = checkCommand(catalog, false);

      expect(ambiguities).to.deep.equal([
        {
          type: "Bean",
          property: "value",
          side: "setter",
          message:
            "Ambiguous setters defined for property 'value' in type 'Bean' with types 'string' and 'number'.",
        },
      ]);
      expect(formatAmbiguities(ambiguities)).to.equal(
        "Bean.value (setter): Ambiguous setters defined for property 'value' in type 'Bean' with types 'string' and 'number'."
      );
    });

    it("should report nothing for unambiguous catalogs", () => {
      expect(checkCommand(createTypeCatalog([account]), false)).to.deep.equal([]);
    });
  });
});
