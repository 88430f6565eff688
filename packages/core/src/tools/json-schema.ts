import { isRecord } from "../utils.js";
import type { ToolParameterSchema } from "./types.js";

export type JsonSchema = Record<string, unknown>;

interface ConvertResult {
  schema: JsonSchema;
  optional: boolean;
}

function cloneFallbackSchema(): JsonSchema {
  return {
    type: "object",
    additionalProperties: true
  };
}

function safeJson(value: unknown): unknown {
  try {
    const encoded = JSON.stringify(value);
    return encoded === undefined ? undefined : JSON.parse(encoded);
  } catch {
    return undefined;
  }
}

function convertStringSchema(def: Record<string, unknown>): JsonSchema {
  const schema: JsonSchema = {
    type: "string"
  };
  const checks = Array.isArray(def.checks) ? def.checks : [];
  for (const check of checks) {
    if (!isRecord(check)) {
      continue;
    }
    const kind = typeof check.kind === "string" ? check.kind : "";
    if (kind === "min" && typeof check.value === "number" && Number.isFinite(check.value)) {
      schema.minLength = check.value;
    } else if (kind === "max" && typeof check.value === "number" && Number.isFinite(check.value)) {
      schema.maxLength = check.value;
    }
  }
  return schema;
}

function convertShape(def: Record<string, unknown>): Record<string, unknown> {
  const rawShape: unknown = typeof def.shape === "function" ? Reflect.apply(def.shape, def, []) : def.shape;
  return isRecord(rawShape) ? rawShape : {};
}

function withDescription(result: ConvertResult, definition: Record<string, unknown>): ConvertResult {
  if (typeof definition.description === "string" && definition.description.trim().length > 0) {
    result.schema.description = definition.description.trim();
  }
  return result;
}

function convertSchema(value: unknown): ConvertResult {
  const definition = isRecord(value) && isRecord(value._def) ? value._def : null;
  const typeName = definition && typeof definition.typeName === "string" ? definition.typeName : "";

  if (!definition || !typeName) {
    return {
      schema: cloneFallbackSchema(),
      optional: false
    };
  }

  if (typeName === "ZodOptional") {
    const inner = convertSchema(definition.innerType);
    return withDescription({ schema: inner.schema, optional: true }, definition);
  }

  if (typeName === "ZodDefault") {
    const inner = convertSchema(definition.innerType);
    const defaultValue =
      typeof definition.defaultValue === "function"
        ? safeJson(Reflect.apply(definition.defaultValue, definition, []))
        : safeJson(definition.defaultValue);
    if (defaultValue !== undefined) {
      inner.schema.default = defaultValue;
    }
    return withDescription({ schema: inner.schema, optional: true }, definition);
  }

  if (typeName === "ZodEffects") {
    return withDescription(convertSchema(definition.schema), definition);
  }

  if (typeName === "ZodObject") {
    const shape = convertShape(definition);
    const properties: Record<string, unknown> = {};
    const required: string[] = [];
    for (const [key, propertySchema] of Object.entries(shape)) {
      const converted = convertSchema(propertySchema);
      properties[key] = converted.schema;
      if (!converted.optional) {
        required.push(key);
      }
    }
    const objectSchema: JsonSchema = {
      type: "object",
      properties,
      additionalProperties: false
    };
    if (required.length > 0) {
      objectSchema.required = required;
    }
    return withDescription({ schema: objectSchema, optional: false }, definition);
  }

  if (typeName === "ZodEnum") {
    const values = Array.isArray(definition.values)
      ? definition.values.filter((entry): entry is string => typeof entry === "string")
      : [];
    return withDescription(
      {
        schema: values.length > 0 ? { type: "string", enum: values } : { type: "string" },
        optional: false
      },
      definition
    );
  }

  if (typeName === "ZodString") {
    return withDescription({ schema: convertStringSchema(definition), optional: false }, definition);
  }

  if (typeName === "ZodNumber") {
    return withDescription({ schema: { type: "number" }, optional: false }, definition);
  }

  if (typeName === "ZodBoolean") {
    return withDescription({ schema: { type: "boolean" }, optional: false }, definition);
  }

  if (typeName === "ZodArray") {
    return withDescription(
      {
        schema: {
          type: "array",
          items: convertSchema(definition.type).schema
        },
        optional: false
      },
      definition
    );
  }

  if (typeName === "ZodRecord") {
    return withDescription(
      {
        schema: {
          type: "object",
          additionalProperties: convertSchema(definition.valueType).schema
        },
        optional: false
      },
      definition
    );
  }

  if (typeName === "ZodAny" || typeName === "ZodUnknown") {
    return {
      schema: {},
      optional: false
    };
  }

  return {
    schema: cloneFallbackSchema(),
    optional: false
  };
}

export function toolInputSchemaFromParameters(parameters?: ToolParameterSchema<unknown>): JsonSchema {
  if (!parameters) {
    return cloneFallbackSchema();
  }
  try {
    const converted = convertSchema(parameters);
    return converted.schema.type === "object" ? converted.schema : cloneFallbackSchema();
  } catch {
    return cloneFallbackSchema();
  }
}
