import type { z } from "zod";

export type CheckOptions = {
  /** Blank input is accepted (the prompt falls back to its default) */
  allowBlank?: boolean;
};

/**
 * Creates a prompt validator from a Zod schema.
 * Returns the first issue's message if invalid, undefined if valid.
 */
export function check<T extends z.ZodType>(
  schema: T,
  options: CheckOptions = {}
) {
  return (value: string | undefined): string | undefined => {
    if (options.allowBlank && (value === undefined || value.trim() === "")) {
      return;
    }
    const result = schema.safeParse(value);
    if (!result.success) return result.error.issues[0]?.message;
    return;
  };
}
