import type { LLMProvider } from "./llm-provider.js";

const MOCK_SCRIPT = [
  "```python",
  "import bpy",
  "",
  "# Clear existing objects",
  "bpy.ops.object.select_all(action='SELECT')",
  "bpy.ops.object.delete()",
  "",
  "# Placeholder object",
  "bpy.ops.mesh.primitive_cube_add(size=2, location=(0, 0, 1))",
  "obj = bpy.context.active_object",
  'obj.name = "MockObject"',
  "```",
].join("\n");

/**
 * MockLLM – a deterministic provider for tests and offline development.
 * Always answers with the same small fenced bpy script, which passes
 * validation without errors or warnings.
 */
export class MockLLM implements LLMProvider {
  readonly name = "MockLLM";

  async generate(_systemPrompt: string, _userMessage: string): Promise<string> {
    return MOCK_SCRIPT;
  }
}
