/**
 * Normalizes a notification data id into a relative path usable under a
 * download directory.
 * Rules:
 * - Colons are removed (illegal in paths on some platforms)
 * - Backslashes are treated as separators
 * - Empty, "." and ".." segments are dropped, so the result never escapes
 *   the directory it is joined to
 * - Fallback to 'file' if nothing remains
 */
export function normalizeDataId(dataId: string): string {
  const withoutColons = dataId.replace(/:/g, "");

  const segments = withoutColons
    .split(/[\\/]+/)
    .filter((segment) => segment !== "" && segment !== "." && segment !== "..");

  if (segments.length === 0) return "file";

  return segments.join("/");
}
