import type { ZodError } from "zod";

/** `path: message` for every issue, joined with `; `. */
export function describeIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
