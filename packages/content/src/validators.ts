import * as z from "zod";
import {
  ActivityDefinitionSchema,
  EnemyDefinitionSchema,
  ItemDefinitionSchema,
  RegionDefinitionSchema,
  type ContentDefinitionMap,
  type ContentKind,
} from "./types.js";

const SCHEMAS: { [K in ContentKind]: z.ZodType<ContentDefinitionMap[K], z.ZodTypeDef, unknown> } = {
  region: RegionDefinitionSchema,
  activity: ActivityDefinitionSchema,
  item: ItemDefinitionSchema,
  enemy: EnemyDefinitionSchema,
};

export class ContentValidationError extends Error {
  constructor(
    message: string,
    public readonly kind: ContentKind,
    public readonly id: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "ContentValidationError";
  }
}

export class UnknownContentError extends Error {
  constructor(
    public readonly kind: ContentKind,
    public readonly id: string,
  ) {
    super(`Unknown ${kind} "${id}"`);
    this.name = "UnknownContentError";
  }
}

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: string[] };

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function validateDefinition<K extends ContentKind>(
  kind: K,
  input: unknown,
): ValidationResult<ContentDefinitionMap[K]> {
  const parsed = SCHEMAS[kind].safeParse(input);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return { success: false, errors: describeIssues(parsed.error) };
}

/** Best-effort id for error messages before the definition is known to be valid. */
function rawId(input: unknown, fallback: string): string {
  if (typeof input === "object" && input !== null && "id" in input && typeof input.id === "string") {
    return input.id;
  }
  return fallback;
}

/**
 * Validates one raw definition. When `expectedId` is given (a file name, say)
 * the definition's own id must match it.
 */
export function parseDefinition<K extends ContentKind>(
  kind: K,
  input: unknown,
  expectedId?: string,
): ContentDefinitionMap[K] {
  const id = rawId(input, expectedId ?? "<unknown>");
  const result = validateDefinition(kind, input);
  if (!result.success) {
    throw new ContentValidationError(
      `Invalid ${kind} "${id}": ${result.errors.join("; ")}`,
      kind,
      id,
      result.errors,
    );
  }
  if (expectedId !== undefined && result.data.id !== expectedId) {
    const issue = `id: expected "${expectedId}", got "${result.data.id}"`;
    throw new ContentValidationError(`Invalid ${kind} "${id}": ${issue}`, kind, id, [issue]);
  }
  return result.data;
}
