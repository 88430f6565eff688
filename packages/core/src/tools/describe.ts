import { isRecord } from "../utils.js";
import { toolInputSchemaFromParameters, type JsonSchema } from "./json-schema.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolDefinition } from "./types.js";

export interface ToolParameterDescription {
  name: string;
  type: string;
  required: boolean;
  description?: string;
}

function schemaTypeLabel(schema: unknown): string {
  if (!isRecord(schema)) {
    return "any";
  }
  if (typeof schema.type === "string") {
    if (schema.type === "array" && isRecord(schema.items) && typeof schema.items.type === "string") {
      return `array<${schema.items.type}>`;
    }
    return schema.type;
  }
  if (Array.isArray(schema.enum)) {
    return schema.enum.map((value) => JSON.stringify(value)).join(" | ");
  }
  if (Array.isArray(schema.anyOf)) {
    return schema.anyOf.map(schemaTypeLabel).join(" | ");
  }
  return "any";
}

export function describeToolParameters(tool: ToolDefinition): ToolParameterDescription[] {
  const schema: JsonSchema = toolInputSchemaFromParameters(tool.parameters);
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = new Set(
    Array.isArray(schema.required) ? schema.required.filter((entry): entry is string => typeof entry === "string") : []
  );

  return Object.entries(properties).map(([name, property]) => {
    const description = isRecord(property) && typeof property.description === "string" ? property.description : undefined;
    return {
      name,
      type: schemaTypeLabel(property),
      required: required.has(name),
      description
    };
  });
}

/** Plain-text tool list for the system prompt. */
export function describeTools(registry: ToolRegistry): string {
  const blocks: string[] = [];
  for (const tool of registry.list()) {
    const lines = [`- ${tool.name}: ${tool.description?.trim() || "(no description)"}`];
    const parameters = describeToolParameters(tool);
    if (parameters.length === 0) {
      lines.push("  parameters: none");
    } else {
      lines.push("  parameters:");
      for (const parameter of parameters) {
        const flag = parameter.required ? "required" : "optional";
        const suffix = parameter.description ? `: ${parameter.description}` : "";
        lines.push(`    - ${parameter.name} (${parameter.type}, ${flag})${suffix}`);
      }
    }
    blocks.push(lines.join("\n"));
  }
  return blocks.join("\n");
}
