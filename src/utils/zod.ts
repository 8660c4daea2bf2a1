import type { output, ZodError, ZodType } from "zod";

export function formatZodError(error: ZodError): string {
    const issues = error.issues ?? [];
    if (!issues.length) return error.message;
    return issues
        .map((issue) => {
            const path = issue.path.length ? issue.path.map(String).join(".") : "";
            return path ? `${path}: ${issue.message}` : issue.message;
        })
        .join("; ");
}

/**
 * Validate `value` against `schema`, throwing an Error with the formatted issues
 */
export function parseWithSchema<S extends ZodType>(schema: S, value: unknown, what: string): output<S> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new Error(`Invalid ${what}: ${formatZodError(parsed.error)}`);
    }
    return parsed.data;
}
