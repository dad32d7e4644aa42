import { z } from 'zod';
import { isRecord } from '../utils.js';

export type JsonSchema = Record<string, unknown>;

const UNSUPPORTED_KEYWORDS = new Set([
  '$ref',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  '$defs',
  'definitions',
  'if',
  'then',
  'else',
  'dependentSchemas',
  'dependentRequired',
  'patternProperties',
]);

const KNOWN_TYPES = new Set([
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
  'null',
]);

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_RE =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const isCalendarDate = (value: string) => {
  const match = DATE_RE.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
};

const isAbsoluteUri = (value: string) => {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
};

const FORMAT_CHECKS: Record<string, (value: string) => boolean> = {
  date: isCalendarDate,
  'date-time': (value) =>
    DATE_TIME_RE.test(value) && !Number.isNaN(Date.parse(value)),
  uri: isAbsoluteUri,
  email: (value) => EMAIL_RE.test(value),
  uuid: (value) => UUID_RE.test(value),
};

export class UnsupportedSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedSchemaError';
  }
}

/**
 * Walks schema positions only (not property names, enum values or defaults),
 * so a property that happens to be called `not` is not reported.
 */
export const findUnsupportedJsonSchemaKeyword = (
  schema: unknown
): string | null => {
  if (!isRecord(schema)) {
    return null;
  }

  for (const key of Object.keys(schema)) {
    if (UNSUPPORTED_KEYWORDS.has(key)) {
      return key;
    }
  }

  const children: unknown[] = [];
  if (isRecord(schema.properties)) {
    children.push(...Object.values(schema.properties));
  }
  if (Array.isArray(schema.items)) {
    children.push(...schema.items);
  } else if (schema.items !== undefined) {
    children.push(schema.items);
  }
  if (isRecord(schema.additionalProperties)) {
    children.push(schema.additionalProperties);
  }

  for (const child of children) {
    const found = findUnsupportedJsonSchemaKeyword(child);
    if (found) {
      return found;
    }
  }
  return null;
};

const getTypeList = (schema: JsonSchema): string[] => {
  const schemaType = schema.type;
  let types: string[] = [];
  if (Array.isArray(schemaType)) {
    types = schemaType.map((item) => String(item).toLowerCase());
  } else if (typeof schemaType === 'string' && schemaType.trim().length > 0) {
    types = [schemaType.toLowerCase()];
  } else if (isRecord(schema.properties) || Array.isArray(schema.required)) {
    types = ['object'];
  } else if (schema.items !== undefined) {
    types = ['array'];
  }

  for (const type of types) {
    if (!KNOWN_TYPES.has(type)) {
      throw new UnsupportedSchemaError(`Unknown JSON Schema type: ${type}`);
    }
  }
  if (schema.nullable === true && types.length > 0 && !types.includes('null')) {
    types.push('null');
  }
  return types;
};

/** Declared root shape of a schema, when it is unambiguous. */
export const rootTypeOf = (schema: unknown): 'object' | 'array' | null => {
  if (!isRecord(schema)) {
    return null;
  }
  const types = getTypeList(schema).filter((type) => type !== 'null');
  if (types.length !== 1) {
    return null;
  }
  const [type] = types;
  return type === 'object' || type === 'array' ? type : null;
};

const jsonEquals = (left: unknown, right: unknown): boolean => {
  if (left === right) {
    return true;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return (
      left.length === right.length &&
      left.every((item, index) => jsonEquals(item, right[index]))
    );
  }
  if (isRecord(left) && isRecord(right)) {
    const leftKeys = Object.keys(left);
    return (
      leftKeys.length === Object.keys(right).length &&
      leftKeys.every((key) => key in right && jsonEquals(left[key], right[key]))
    );
  }
  return false;
};

const readNumber = (schema: JsonSchema, key: string) => {
  const value = schema[key];
  return typeof value === 'number' ? value : undefined;
};

const buildString = (schema: JsonSchema): z.ZodTypeAny => {
  let result = z.string();
  const minLength = readNumber(schema, 'minLength');
  const maxLength = readNumber(schema, 'maxLength');
  if (minLength !== undefined) {
    result = result.min(minLength, `Must be at least ${minLength} characters`);
  }
  if (maxLength !== undefined) {
    result = result.max(maxLength, `Must be at most ${maxLength} characters`);
  }
  if (typeof schema.pattern === 'string') {
    result = result.regex(
      new RegExp(schema.pattern, 'u'),
      `Must match pattern ${schema.pattern}`
    );
  }

  const format = typeof schema.format === 'string' ? schema.format : null;
  const check = format ? FORMAT_CHECKS[format] : undefined;
  if (!format || !check) {
    // Unknown formats are annotations only.
    return result;
  }
  return result.superRefine((value, ctx) => {
    if (!check(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Must be a valid ${format}`,
        params: { rule: 'format' },
      });
    }
  });
};

const buildNumber = (schema: JsonSchema, integer: boolean): z.ZodTypeAny => {
  let result = z.number();
  if (integer) {
    result = result.int();
  }

  const minimum = readNumber(schema, 'minimum');
  const maximum = readNumber(schema, 'maximum');
  const exclusiveMinimum = schema.exclusiveMinimum;
  const exclusiveMaximum = schema.exclusiveMaximum;

  if (typeof exclusiveMinimum === 'number') {
    result = result.gt(exclusiveMinimum);
  }
  if (minimum !== undefined) {
    result = exclusiveMinimum === true ? result.gt(minimum) : result.gte(minimum);
  }
  if (typeof exclusiveMaximum === 'number') {
    result = result.lt(exclusiveMaximum);
  }
  if (maximum !== undefined) {
    result = exclusiveMaximum === true ? result.lt(maximum) : result.lte(maximum);
  }
  const multipleOf = readNumber(schema, 'multipleOf');
  if (multipleOf !== undefined && multipleOf > 0) {
    result = result.multipleOf(multipleOf);
  }
  return result;
};

const buildArray = (schema: JsonSchema, path: string): z.ZodTypeAny => {
  if (Array.isArray(schema.items)) {
    throw new UnsupportedSchemaError(`Tuple "items" is not supported at ${path || 'root'}`);
  }
  const items = isRecord(schema.items)
    ? compileNode(schema.items, `${path}[]`)
    : z.unknown();

  let result = z.array(items);
  const minItems = readNumber(schema, 'minItems');
  const maxItems = readNumber(schema, 'maxItems');
  if (minItems !== undefined) {
    result = result.min(minItems, `Must contain at least ${minItems} items`);
  }
  if (maxItems !== undefined) {
    result = result.max(maxItems, `Must contain at most ${maxItems} items`);
  }
  if (schema.uniqueItems !== true) {
    return result;
  }
  return result.superRefine((values, ctx) => {
    for (let index = 1; index < values.length; index++) {
      if (values.slice(0, index).some((earlier) => jsonEquals(earlier, values[index]))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Items must be unique',
          path: [index],
          params: { rule: 'uniqueItems' },
        });
      }
    }
  });
};

const buildObject = (schema: JsonSchema, path: string): z.ZodTypeAny => {
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = new Set(
    Array.isArray(schema.required)
      ? schema.required.map((item) => String(item)).filter((item) => item.length > 0)
      : []
  );

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [propertyName, propertySchema] of Object.entries(properties)) {
    const propertyPath = path ? `${path}.${propertyName}` : propertyName;
    const propertyType = isRecord(propertySchema)
      ? compileNode(propertySchema, propertyPath)
      : anyValue();
    shape[propertyName] = required.has(propertyName)
      ? propertyType
      : propertyType.optional();
  }
  // Required names without a property definition still have to be present.
  for (const name of required) {
    if (!(name in shape)) {
      shape[name] = anyValue();
    }
  }

  const base = z.object(shape);
  if (schema.additionalProperties === false) {
    return base.strict();
  }
  if (isRecord(schema.additionalProperties)) {
    return base.catchall(
      compileNode(schema.additionalProperties, path ? `${path}.*` : '*')
    );
  }
  return base.passthrough();
};

/** Any JSON value; rejects only absence so `required` still applies. */
const anyValue = () =>
  z.custom<unknown>((value) => value !== undefined, {
    message: 'Required',
    params: { rule: 'required' },
  });

const buildForType = (type: string, schema: JsonSchema, path: string): z.ZodTypeAny => {
  switch (type) {
    case 'string':
      return buildString(schema);
    case 'number':
      return buildNumber(schema, false);
    case 'integer':
      return buildNumber(schema, true);
    case 'boolean':
      return z.boolean();
    case 'null':
      return z.null();
    case 'array':
      return buildArray(schema, path);
    default:
      return buildObject(schema, path);
  }
};

const withValueConstraints = (
  schema: JsonSchema,
  base: z.ZodTypeAny
): z.ZodTypeAny => {
  const enumValues = Array.isArray(schema.enum) ? schema.enum : null;
  const hasConst = Object.prototype.hasOwnProperty.call(schema, 'const');
  if (!enumValues && !hasConst) {
    return base;
  }

  return base.superRefine((value, ctx) => {
    if (enumValues && !enumValues.some((allowed) => jsonEquals(allowed, value))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Must be one of: ${enumValues.map((item) => JSON.stringify(item)).join(', ')}`,
        params: { rule: 'enum' },
      });
    }
    if (hasConst && !jsonEquals(schema.const, value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Must equal ${JSON.stringify(schema.const)}`,
        params: { rule: 'const' },
      });
    }
  });
};

const compileNode = (schema: JsonSchema, path: string): z.ZodTypeAny => {
  const types = getTypeList(schema);
  const nonNull = types.filter((type) => type !== 'null');
  const allowsNull = types.includes('null');

  let base: z.ZodTypeAny;
  if (types.length === 0) {
    base = anyValue();
  } else if (nonNull.length === 0) {
    base = z.null();
  } else {
    const variants = nonNull.map((type) => buildForType(type, schema, path));
    const [first, second, ...rest] = variants;
    base = second ? z.union([first, second, ...rest]) : first;
    if (allowsNull) {
      base = base.nullable();
    }
  }

  return withValueConstraints(schema, base);
};

/**
 * Compile a JSON Schema document into a zod schema that mirrors its
 * validation semantics.
 *
 * @throws UnsupportedSchemaError for composition keywords and tuple arrays
 */
export const compileJsonSchema = (schema: unknown): z.ZodTypeAny => {
  if (!isRecord(schema)) {
    throw new UnsupportedSchemaError('Top-level schema must be an object');
  }
  const unsupported = findUnsupportedJsonSchemaKeyword(schema);
  if (unsupported) {
    throw new UnsupportedSchemaError(`Unsupported JSON Schema keyword: ${unsupported}`);
  }
  try {
    return compileNode(schema, '');
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new UnsupportedSchemaError(`Invalid pattern in schema: ${error.message}`);
    }
    throw error;
  }
};
