// SQLSTATE for unique_violation
const UNIQUE_VIOLATION = "23505";

const errorCode = (error: unknown): string | undefined => {
  if (error === null || typeof error !== "object") return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  // newer drizzle releases wrap the driver error
  if ("cause" in error) return errorCode(error.cause);
  return undefined;
};

export const isUniqueViolation = (error: unknown): boolean => errorCode(error) === UNIQUE_VIOLATION;
