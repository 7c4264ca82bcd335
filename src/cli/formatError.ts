import { ZodError } from "zod";

/**
 * One-line description of a fatal error for the console.
 */
export const formatError = (error: unknown): string => {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    );
    return `Invalid configuration: ${issues.join("; ")}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
