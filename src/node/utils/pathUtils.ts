/**
 * Strip trailing slashes from a path or URL, keeping a bare "/" intact.
 */
export function stripTrailingSlashes(value: string): string {
  const stripped = value.replace(/\/+$/, "");
  return stripped === "" && value.startsWith("/") ? "/" : stripped;
}
