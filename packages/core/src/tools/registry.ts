import { asToolDefinition } from "./definition.js";
import type { ToolDefinition, ToolRegistryDiagnostics, ToolRegistryResult } from "./types.js";

/** Indexes tools by name; malformed or duplicate definitions are skipped and reported. */
export function buildToolRegistry(tools: readonly unknown[]): ToolRegistryResult {
  const registry = new Map<string, ToolDefinition>();
  const diagnostics: ToolRegistryDiagnostics = {
    loadedCount: 0,
    skipped: []
  };

  for (const candidate of tools) {
    const tool = asToolDefinition(candidate);
    if (!tool) {
      diagnostics.skipped.push({
        reason: "invalid_shape",
        message: "Expected a tool definition with a snake_case name, execute, and a zod object parameters schema"
      });
      continue;
    }
    if (registry.has(tool.name)) {
      diagnostics.skipped.push({
        reason: "name_collision",
        message: `Tool name "${tool.name}" is already registered`,
        toolName: tool.name
      });
      continue;
    }
    registry.set(tool.name, tool);
    diagnostics.loadedCount += 1;
  }

  return { tools: registry, diagnostics };
}
