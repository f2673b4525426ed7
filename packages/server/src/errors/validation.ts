import { BaseError } from "@conduit/errors"

type SchemaIssue = {
  path: readonly PropertyKey[]
  message: string
}

export type ValidationIssue = { path: string; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

function isSchemaIssue(value: unknown): value is SchemaIssue {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    Array.isArray(value.path) &&
    "message" in value &&
    typeof value.message === "string"
  )
}

function issuesOf(err: unknown): SchemaIssue[] | undefined {
  if (!(err instanceof Error) || !("issues" in err) || !Array.isArray(err.issues)) {
    return undefined
  }

  const issues: unknown[] = err.issues

  return issues.every(isSchemaIssue) ? issues : undefined
}

export class ValidationError extends BaseError<"validation_error"> {
  readonly issues: readonly ValidationIssue[]

  constructor(message: string, issues: ValidationIssue[]) {
    super(message, { code: "validation_error", context: { issues } })
    this.issues = issues
  }

  static fromIssues(issues: readonly SchemaIssue[]): ValidationError {
    const formatted = issues.map((i) => ({ path: formatPath(i.path), message: i.message }))
    const first = formatted[0]

    const message = first
      ? first.path
        ? `${first.path}: ${first.message}`
        : first.message
      : "Invalid input"

    return new ValidationError(message, formatted)
  }
}

/**
 * Parses with a zod (or zod/mini) schema, turning schema failures into a
 * ValidationError. Other errors pass through.
 */
export function parseOrThrow<T>(schema: { parse: (data: unknown) => T }, data: unknown): T {
  try {
    return schema.parse(data)
  } catch (err) {
    const issues = issuesOf(err)
    if (issues) throw ValidationError.fromIssues(issues)

    throw err
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
