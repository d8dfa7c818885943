import { describe, it, expect } from "vitest";
import { CodeValidator } from "../core/validation/codeValidator.js";
import { findSyntaxError } from "../core/validation/pythonSyntax.js";
import { ValidationReportSchema } from "../core/schemas/index.js";

const CLEAN_SCRIPT = [
  "import bpy",
  "",
  "# Clear existing objects",
  "bpy.ops.object.select_all(action='SELECT')",
  "bpy.ops.object.delete()",
  "",
  "# Add a cube",
  "bpy.ops.mesh.primitive_cube_add(size=2, location=(0, 0, 1))",
  "cube = bpy.context.active_object",
  'cube.name = "Cube"',
].join("\n");

describe("findSyntaxError", () => {
  it("should accept valid Python", () => {
    expect(findSyntaxError(CLEAN_SCRIPT)).toBeNull();
    expect(findSyntaxError("def f(x):\n    return x * 2\n")).toBeNull();
  });

  it("should report the line of the first error", () => {
    expect(findSyntaxError("import bpy\nx = = 2\n")?.line).toBe(2);
  });

  it("should accept brackets, docstrings and line continuations", () => {
    const code = [
      "import bpy",
      "",
      "def make(name, size=2):",
      '    """Create a cube.',
      "",
      '    Returns the object."""',
      "    bpy.ops.mesh.primitive_cube_add(",
      "        size=size,  # edge length",
      "        location=(0, 0, 1),",
      "    )",
      "    obj = bpy.context.active_object",
      "    obj.name = name",
      "    return obj",
      "",
      "total = 1 + \\",
      "    2",
      'cube = make("Box")',
    ].join("\n");
    expect(findSyntaxError(code)).toBeNull();
  });

  it("should accept a parenthesized with statement", () => {
    expect(findSyntaxError("with (\n    a as b,\n    c as d,\n):\n    pass")).toBeNull();
  });

  it("should reject an unexpected indent", () => {
    expect(findSyntaxError("import bpy\n    x = 1")).toEqual({ line: 2, message: "unexpected indent" });
  });

  it("should reject a dedent that matches no outer level", () => {
    expect(findSyntaxError("if True:\n    a = 1\n  b = 2")).toEqual({
      line: 3,
      message: "unindent does not match any outer indentation level",
    });
  });

  it("should reject an unterminated string", () => {
    expect(findSyntaxError('x = "abc')).toEqual({ line: 1, message: "unterminated string literal" });
  });

  it("should reject a print statement", () => {
    expect(findSyntaxError('print "hi"')).toEqual({
      line: 1,
      message: "Missing parentheses in call to 'print'. Did you mean print(...)?",
    });
    expect(findSyntaxError('print("hi")')).toBeNull();
  });

  it("should reject assignment to a literal", () => {
    expect(findSyntaxError("1 = x")).toEqual({ line: 1, message: "cannot assign to literal" });
  });
});

describe("CodeValidator", () => {
  const validator = new CodeValidator();

  describe("validate", () => {
    it("should pass a clean script with no warnings", () => {
      expect(validator.validate(CLEAN_SCRIPT)).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it("should stop at a syntax error", () => {
      const report = validator.validate("1 +");

      expect(report.isValid).toBe(false);
      expect(report.errors).toHaveLength(1);
      expect(report.errors[0]).toMatch(/^Syntax Error at line 1: /);
      expect(report.warnings).toEqual([]);
    });

    it("should reject dangerous calls and still collect warnings", () => {
      const report = validator.validate('import bpy\nimport os\nos.system("rm -rf /")');

      expect(report).toEqual({
        isValid: false,
        errors: ["Dangerous operation detected: os.system"],
        warnings: ["Code doesn't clear existing objects - may cause conflicts"],
      });
    });

    it("should report scanner errors as syntax errors", () => {
      expect(validator.validate('import bpy\nx = "abc')).toEqual({
        isValid: false,
        errors: ["Syntax Error at line 2: unterminated string literal"],
        warnings: [],
      });
    });

    it("should keep isValid consistent with errors", () => {
      for (const code of [CLEAN_SCRIPT, "1 +", "import requests"]) {
        expect(() => ValidationReportSchema.parse(validator.validate(code))).not.toThrow();
      }
    });
  });

  describe("checkSecurity", () => {
    it("should flag open() both as dangerous and as a file operation", () => {
      expect(validator.checkSecurity('import bpy\nf = open("data.txt")\n')).toEqual([
        "Dangerous operation detected: open",
        "File operation detected: open(",
      ]);
    });

    it("should ignore file operations that only appear in comments", () => {
      expect(validator.checkSecurity(`${CLEAN_SCRIPT}\n# write(log) disabled`)).toEqual([]);
    });

    it("should flag a file operation written before a comment", () => {
      expect(validator.checkSecurity("import bpy\nf.write(x)  # log\n")).toEqual([
        "File operation detected: write(",
      ]);
    });

    it("should flag a file operation when only some occurrences are commented", () => {
      expect(validator.checkSecurity("import bpy\n# f.write(a)\nf.write(b)\n")).toEqual([
        "File operation detected: write(",
      ]);
    });

    it("should flag network imports", () => {
      expect(validator.checkSecurity("import bpy\nimport requests\n")).toEqual([
        "Network operation detected: requests",
      ]);
      expect(validator.checkSecurity("from urllib import request\n")).toEqual([
        "Network operation detected: urllib",
      ]);
    });
  });

  describe("checkImports", () => {
    it("should warn when bpy is missing", () => {
      expect(validator.checkImports("x = 1")).toEqual(["Missing recommended import: bpy"]);
    });

    it("should warn about math mentioned without importing it", () => {
      expect(
        validator.checkImports("import bpy\nfrom mathutils import Vector\nv = Vector((0, 0, 1))"),
      ).toEqual(["Code mentions 'math' but doesn't import math module"]);
    });
  });

  describe("checkBlenderApi", () => {
    it("should warn about unnamed objects and missing scene clearing", () => {
      expect(validator.checkBlenderApi("bpy.ops.mesh.primitive_cube_add()")).toEqual([
        "Code doesn't clear existing objects - may cause conflicts",
        "Objects created but not named - may be hard to reference",
      ]);
    });

    it("should warn about many operators without an active object", () => {
      const code = Array.from({ length: 6 }, () => "bpy.ops.object.select_all(action='DESELECT')").join("\n");
      expect(validator.checkBlenderApi(code)).toEqual([
        "Many operations without setting active object - may cause issues",
      ]);
    });

    it("should warn about objects that are never linked", () => {
      const code = "obj = bpy.data.objects.new('Empty', None)\nbpy.ops.object.delete()";
      expect(validator.checkBlenderApi(code)).toEqual([
        "Objects created but not linked to scene collection",
      ]);
    });
  });

  describe("getSuggestions", () => {
    it("should suggest error handling for a short commented script", () => {
      expect(validator.getSuggestions(CLEAN_SCRIPT)).toEqual([
        "Consider adding try-except blocks for error handling",
      ]);
    });

    it("should suggest comments and functions for a long flat script", () => {
      const code = Array.from({ length: 60 }, (_, i) => `x${i} = ${i}`).join("\n");
      expect(validator.getSuggestions(code)).toEqual([
        "Consider adding try-except blocks for error handling",
        "Consider adding more comments to explain the code",
        "Consider organizing code into functions for better readability",
      ]);
    });

    it("should suggest collections when many operators run", () => {
      const code = Array.from({ length: 11 }, () => "bpy.ops.mesh.primitive_cube_add()  # cube").join("\n");
      expect(validator.getSuggestions(code)).toContain("Consider using collections to organize many objects");
    });
  });

  describe("autoFix", () => {
    it("should add the import and the scene-clearing block", () => {
      expect(validator.autoFix("bpy.ops.mesh.primitive_cube_add()")).toBe(
        "import bpy\n" +
          "# Clear existing objects\n" +
          "bpy.ops.object.select_all(action='SELECT')\n" +
          "bpy.ops.object.delete()\n" +
          "\n" +
          "\n" +
          "bpy.ops.mesh.primitive_cube_add()",
      );
    });

    it("should insert clearing after the last import", () => {
      const fixed = validator.autoFix("import bpy\nimport math\nx = math.pi");
      expect(fixed.split("\n").slice(0, 4)).toEqual([
        "import bpy",
        "import math",
        "# Clear existing objects",
        "bpy.ops.object.select_all(action='SELECT')",
      ]);
    });

    it("should accept from-imports of bpy", () => {
      expect(validator.autoFix("from bpy import data\nx = 1")).toBe(
        "from bpy import data\n" +
          "# Clear existing objects\n" +
          "bpy.ops.object.select_all(action='SELECT')\n" +
          "bpy.ops.object.delete()\n" +
          "\n" +
          "\n" +
          "x = 1",
      );
    });

    it("should be idempotent", () => {
      const once = validator.autoFix("bpy.ops.mesh.primitive_cube_add()");
      expect(validator.autoFix(once)).toBe(once);
    });

    it("should leave a clean script untouched", () => {
      expect(validator.autoFix(CLEAN_SCRIPT)).toBe(CLEAN_SCRIPT);
    });
  });

  describe("custom rules", () => {
    it("should replace the deny-list", () => {
      const strict = new CodeValidator({ dangerousOperations: ["quit_blender"] });
      const report = strict.validate(`${CLEAN_SCRIPT}\nbpy.ops.wm.quit_blender()`);

      expect(report.errors).toEqual(["Dangerous operation detected: quit_blender"]);
    });
  });
});
