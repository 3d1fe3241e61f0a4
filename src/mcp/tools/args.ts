import type { z } from "zod";

/** Validates tool arguments, applying schema defaults. Throws with the failing fields named. */
export function parseArgs<T>(tool: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `'${i.path.join(".")}' ${i.message}` : i.message,
    );
    throw new Error(`Invalid arguments for ${tool}: ${issues.join("; ")}`);
  }
  return parsed.data;
}
