/**
 * Tests for descriptor JSON loader
 */

import { describe, it } from "mocha";
import { strict as assert } from "assert";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
  loadDescriptorDirectory,
  loadDescriptorFile,
  parseDescriptorDocument,
} from "./descriptor-loader.js";

const userDocument = {
  types: [
    {
      name: "User",
      kind: "class",
      typeParameters: [
        { name: "K", constraint: { kind: "referenceType", name: "Serializable" } },
      ],
      superclass: {
        kind: "referenceType",
        name: "Entity",
        typeArguments: [{ kind: "typeParameterType", name: "K" }],
      },
      methods: [
        {
          name: "getName",
          returnType: { kind: "primitiveType", name: "string" },
        },
        {
          name: "setName",
          parameters: [{ kind: "primitiveType", name: "string" }],
          accessibility: "protected",
        },
      ],
      fields: [
        {
          name: "tags",
          type: {
            kind: "arrayType",
            elementType: { kind: "primitiveType", name: "string" },
          },
          isReadonly: true,
        },
      ],
      constructors: [{}],
    },
  ],
};

const withTempDir = <T>(fn: (dir: string) => T): T => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "proplens-test-"));
  try {
    return fn(tmpDir);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
};

describe("Descriptor Loader", () => {
  describe("parseDescriptorDocument", () => {
    it("should normalize a valid document with defaults", () => {
      const result = parseDescriptorDocument(userDocument, "user.descriptors.json");

      assert.ok(result.ok);
      if (!result.ok) return;
      const [user] = result.value;
      assert.ok(user);
      assert.equal(user.name, "User");
      assert.equal(user.kind, "class");
      assert.equal(user.isAbstract, false);
      assert.deepEqual(user.superclass, {
        kind: "referenceType",
        name: "Entity",
        typeArguments: [{ kind: "typeParameterType", name: "K" }],
      });
      assert.deepEqual(user.typeParameters, [
        { name: "K", constraint: { kind: "referenceType", name: "Serializable" } },
      ]);

      const [getter, setter] = user.methods;
      assert.deepEqual(getter?.parameters, []);
      assert.equal(getter?.accessibility, "public");
      assert.equal(getter?.isBridge, false);
      assert.deepEqual(setter?.returnType, { kind: "voidType" });
      assert.equal(setter?.accessibility, "protected");

      assert.equal(user.fields[0]?.isReadonly, true);
      assert.equal(user.fields[0]?.isStatic, false);
      assert.deepEqual(user.constructors, [{ parameters: [], accessibility: "public" }]);
    });

    it("should mark interfaces abstract", () => {
      const result = parseDescriptorDocument(
        { types: [{ name: "Named", kind: "interface" }] },
        "named.descriptors.json"
      );

      assert.ok(result.ok);
      assert.equal(result.ok && result.value[0]?.isAbstract, true);
    });

    it("should reject a document that is not an object", () => {
      const result = parseDescriptorDocument([], "list.descriptors.json");

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9004");
        assert.equal(result.error[0]?.message, "Descriptor file must be an object, got array");
      }
    });

    it("should reject a missing types array", () => {
      const result = parseDescriptorDocument({}, "empty.descriptors.json");

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9005");
      }
    });

    it("should report every invalid entry", () => {
      const result = parseDescriptorDocument(
        {
          types: [
            "User",
            { kind: "class" },
            { name: "Thing", kind: "struct" },
            {
              name: "Order",
              kind: "class",
              fields: [{ name: "total", type: { kind: "decimal" } }],
              methods: [{ name: "getId", accessibility: "internal" }],
            },
          ],
        },
        "bad.descriptors.json"
      );

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.deepEqual(
          result.error.map((d) => d.code),
          ["PLN9006", "PLN9007", "PLN9008", "PLN9011", "PLN9009"]
        );
        assert.equal(
          result.error[4]?.message,
          "Invalid type reference in fields[0] of type 3 in bad.descriptors.json (Order): unknown kind 'decimal'"
        );
      }
    });

    it("should report a non-array parameter list once", () => {
      const result = parseDescriptorDocument(
        {
          types: [{ name: "Bean", kind: "class", methods: [{ name: "setX", parameters: "x" }] }],
        },
        "bean.descriptors.json"
      );

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error.length, 1);
        assert.equal(result.error[0]?.code, "PLN9010");
      }
    });
  });

  describe("loadDescriptorFile", () => {
    it("should load a valid descriptor file", () => {
      const result = withTempDir((dir) => {
        const filePath = path.join(dir, "user.descriptors.json");
        fs.writeFileSync(filePath, JSON.stringify(userDocument, null, 2));
        return loadDescriptorFile(filePath);
      });

      assert.ok(result.ok);
      assert.equal(result.ok && result.value.length, 1);
    });

    it("should return error for non-existent file", () => {
      const result = loadDescriptorFile("/nonexistent/file.descriptors.json");

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9001");
      }
    });

    it("should return error for invalid JSON", () => {
      const result = withTempDir((dir) => {
        const filePath = path.join(dir, "broken.descriptors.json");
        fs.writeFileSync(filePath, "{ types: ");
        return loadDescriptorFile(filePath);
      });

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9003");
      }
    });
  });

  describe("loadDescriptorDirectory", () => {
    it("should load descriptor files in name order", () => {
      const result = withTempDir((dir) => {
        fs.writeFileSync(
          path.join(dir, "b.descriptors.json"),
          JSON.stringify({ types: [{ name: "Second", kind: "class" }] })
        );
        fs.writeFileSync(
          path.join(dir, "a.descriptors.json"),
          JSON.stringify({ types: [{ name: "First", kind: "class" }] })
        );
        fs.writeFileSync(path.join(dir, "notes.json"), "{}");
        return loadDescriptorDirectory(dir);
      });

      assert.ok(result.ok);
      if (result.ok) {
        assert.deepEqual(
          result.value.map((d) => d.name),
          ["First", "Second"]
        );
      }
    });

    it("should aggregate diagnostics across files", () => {
      const result = withTempDir((dir) => {
        fs.writeFileSync(path.join(dir, "a.descriptors.json"), "[]");
        fs.writeFileSync(path.join(dir, "b.descriptors.json"), "{}");
        return loadDescriptorDirectory(dir);
      });

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.deepEqual(
          result.error.map((d) => d.code),
          ["PLN9004", "PLN9005"]
        );
      }
    });

    it("should return error for non-existent directory", () => {
      const result = loadDescriptorDirectory("/nonexistent/descriptors");

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9016");
      }
    });

    it("should return error for a file path", () => {
      const result = withTempDir((dir) => {
        const filePath = path.join(dir, "single.descriptors.json");
        fs.writeFileSync(filePath, "{}");
        return loadDescriptorDirectory(filePath);
      });

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9017");
      }
    });

    it("should return error when no descriptor files exist", () => {
      const result = withTempDir((dir) => loadDescriptorDirectory(dir));

      assert.ok(!result.ok);
      if (!result.ok) {
        assert.equal(result.error[0]?.code, "PLN9018");
      }
    });
  });
});
