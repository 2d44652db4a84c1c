/**
 * URL utilities shared by the link and article parsers.
 */

/**
 * Resolve a possibly-relative href against the page it was found on.
 * Returns null for values the URL parser rejects.
 */
export function absolutize(url: string, base: string): string | null {
    try {
        return new URL(url, base).toString();
    } catch {
        return null;
    }
}
