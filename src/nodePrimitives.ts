/** Returns true when {@link error} is a filesystem error carrying {@link code}. */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
