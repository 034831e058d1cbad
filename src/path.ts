/**
 * Collapse repeated slashes, force a leading slash and drop a trailing one.
 * The root path stays "/".
 */
export function normalizePath(path: string): string {
    const collapsed = `/${path}`.replace(/\/{2,}/g, "/");
    if (collapsed.length > 1 && collapsed.endsWith("/")) return collapsed.slice(0, -1);
    return collapsed;
}

/**
 * Join a group prefix and a path registered on it.
 *
 *   getGroupPath("/api", "/v1")  // "/api/v1"
 *   getGroupPath("/api/", "v1/") // "/api/v1"
 *   getGroupPath("/api", "")     // "/api"
 */
export function getGroupPath(prefix: string, path: string): string {
    if (path.length === 0) return normalizePath(prefix);
    return normalizePath(`${prefix}/${path}`);
}
