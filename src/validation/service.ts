import { z } from 'zod';
import type { SchemaViolation } from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import { compileJsonSchema, type JsonSchema } from './schema-utils.js';
import type { ValidationOutcome } from './views.js';

const logger = createLogger('structura.validation');

const formatPath = (path: (string | number)[]) => path.map(String).join('.');

const violation = (
  path: (string | number)[],
  rule: string,
  message: string
): SchemaViolation => ({ path: formatPath(path), rule, message });

const ruleFromParams = (params: Record<string, unknown> | undefined) =>
  typeof params?.rule === 'string' ? params.rule : 'custom';

const isTypeMismatchAt = (issue: z.ZodIssue, depth: number) =>
  issue.code === z.ZodIssueCode.invalid_type && issue.path.length === depth;

/**
 * Translate zod issues back into JSON Schema vocabulary: each violation names
 * the keyword that failed.
 */
export const issuesToViolations = (issues: z.ZodIssue[]): SchemaViolation[] =>
  issues.flatMap((issue): SchemaViolation[] => {
    switch (issue.code) {
      case z.ZodIssueCode.invalid_type:
        if (issue.received === 'undefined') {
          return [violation(issue.path, 'required', 'Required property is missing')];
        }
        return [
          violation(issue.path, 'type', `Expected ${issue.expected}, received ${issue.received}`),
        ];

      case z.ZodIssueCode.invalid_union: {
        const depth = issue.path.length;
        const informative = issue.unionErrors.find((error) =>
          error.issues.some((inner) => !isTypeMismatchAt(inner, depth))
        );
        if (informative) {
          return issuesToViolations(informative.issues);
        }
        const mismatches = issue.unionErrors
          .flatMap((error) => error.issues)
          .filter((inner): inner is Extract<z.ZodIssue, { code: typeof z.ZodIssueCode.invalid_type }> =>
            isTypeMismatchAt(inner, depth)
          );
        const received = mismatches[0]?.received ?? 'unknown';
        if (received === 'undefined') {
          return [violation(issue.path, 'required', 'Required property is missing')];
        }
        const expected = [...new Set(mismatches.map((inner) => inner.expected))];
        return [
          violation(issue.path, 'type', `Expected ${expected.join(' or ')}, received ${received}`),
        ];
      }

      case z.ZodIssueCode.unrecognized_keys:
        return [
          violation(
            issue.path,
            'additionalProperties',
            `Unexpected properties: ${issue.keys.join(', ')}`
          ),
        ];

      case z.ZodIssueCode.too_small: {
        const rule =
          issue.type === 'string'
            ? 'minLength'
            : issue.type === 'array'
              ? 'minItems'
              : issue.inclusive
                ? 'minimum'
                : 'exclusiveMinimum';
        const message =
          issue.type === 'number'
            ? `Must be ${issue.inclusive ? 'greater than or equal to' : 'greater than'} ${issue.minimum}`
            : issue.message;
        return [violation(issue.path, rule, message)];
      }

      case z.ZodIssueCode.too_big: {
        const rule =
          issue.type === 'string'
            ? 'maxLength'
            : issue.type === 'array'
              ? 'maxItems'
              : issue.inclusive
                ? 'maximum'
                : 'exclusiveMaximum';
        const message =
          issue.type === 'number'
            ? `Must be ${issue.inclusive ? 'less than or equal to' : 'less than'} ${issue.maximum}`
            : issue.message;
        return [violation(issue.path, rule, message)];
      }

      case z.ZodIssueCode.invalid_string:
        return [
          violation(issue.path, issue.validation === 'regex' ? 'pattern' : 'format', issue.message),
        ];

      case z.ZodIssueCode.not_multiple_of:
        return [violation(issue.path, 'multipleOf', `Must be a multiple of ${issue.multipleOf}`)];

      case z.ZodIssueCode.custom:
        return [violation(issue.path, ruleFromParams(issue.params), issue.message)];

      default:
        return [violation(issue.path, issue.code, issue.message)];
    }
  });

export class SchemaValidator {
  private readonly compiled = new WeakMap<JsonSchema, z.ZodTypeAny>();

  /**
   * Compile (and memoise) a schema. Throws UnsupportedSchemaError when the
   * schema uses keywords this validator does not implement.
   */
  compile(schema: JsonSchema): z.ZodTypeAny {
    const cached = this.compiled.get(schema);
    if (cached) {
      return cached;
    }
    const compiled = compileJsonSchema(schema);
    this.compiled.set(schema, compiled);
    return compiled;
  }

  /** Validate a candidate document, collecting every violation. */
  validate(candidate: unknown, schema: JsonSchema): ValidationOutcome {
    const result = this.compile(schema).safeParse(candidate);
    if (result.success) {
      return { valid: true, data: result.data };
    }

    const violations = issuesToViolations(result.error.issues);
    logger.debug(
      `Schema validation failed with ${violations.length} violation(s)`,
      violations.map((item) => `${item.path || '(root)'}: ${item.rule}`)
    );
    return { valid: false, violations };
  }
}
