import { z } from 'zod';

type JsonSchemaNode = Record<string, unknown>;

function isSchemaNode(value: unknown): value is JsonSchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function jsonSchemaToZod(prop: JsonSchemaNode): z.ZodTypeAny {
  const description = typeof prop.description === 'string' ? prop.description : undefined;

  let zodType: z.ZodTypeAny;

  switch (prop.type) {
    case 'string': {
      const [first, ...rest] = stringList(prop.enum);
      zodType = first === undefined ? z.string() : z.enum([first, ...rest]);
      break;
    }
    case 'number':
    case 'integer': {
      let num = z.number();
      if (typeof prop.minimum === 'number') num = num.min(prop.minimum);
      if (typeof prop.maximum === 'number') num = num.max(prop.maximum);
      if (prop.type === 'integer') num = num.int();
      zodType = num;
      break;
    }
    case 'boolean':
      zodType = z.boolean();
      break;
    case 'array':
      zodType = z.array(isSchemaNode(prop.items) ? jsonSchemaToZod(prop.items) : z.unknown());
      break;
    case 'object':
      if (isSchemaNode(prop.properties)) {
        zodType = z.object(buildZodShape(prop));
      } else {
        zodType = z.record(z.string(), z.unknown());
      }
      break;
    default:
      zodType = z.unknown();
  }

  if (description) {
    zodType = zodType.describe(description);
  }

  return zodType;
}

/** Build a ZodRawShape from a JSON Schema inputSchema for McpServer.tool() registration. */
export function buildZodShape(inputSchema: JsonSchemaNode): Record<string, z.ZodTypeAny> {
  const props = isSchemaNode(inputSchema.properties) ? inputSchema.properties : {};
  const requiredKeys = new Set(stringList(inputSchema.required));
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, descriptor] of Object.entries(props)) {
    const zodType = jsonSchemaToZod(isSchemaNode(descriptor) ? descriptor : {});
    shape[key] = requiredKeys.has(key) ? zodType : zodType.optional();
  }
  return shape;
}
