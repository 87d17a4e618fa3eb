/**
 * Text utility functions
 */

/**
 * Formats a string to be safe for use as a filename
 * - Removes invalid characters: \ / * ? : " < > |
 * - Replaces whitespace runs with underscores
 * - Limits length to 100 characters
 */
export function formatFilename(name: string): string {
    return name
        .replace(/[\\/*?:"<>|]/g, '')
        .trim()
        .replace(/\s+/g, '_')
        .slice(0, 100);
}

/**
 * Collapses whitespace the way the page renders it
 */
export function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Resolves a possibly relative link against the page it was found on.
 * Returns '' for an empty link and the link untouched when it cannot be parsed.
 */
export function resolveUrl(baseUrl: string, url: string): string {
    const trimmed = url.trim();
    if (!trimmed) {
        return '';
    }
    try {
        return new URL(trimmed, baseUrl).toString();
    } catch {
        return trimmed;
    }
}

/**
 * Extension of the file a URL points at, without the leading dot.
 * Everything after the first dot of the last path segment counts,
 * so `archive.tar.gz` gives `tar.gz`. Query string and fragment are ignored.
 *
 * @example getExtension('https://example.com/a.jpg?x=1') // 'jpg'
 */
export function getExtension(url: string): string {
    let path = url;
    try {
        path = new URL(url).pathname;
    } catch {
        path = url.split(/[?#]/)[0] ?? '';
    }

    const segment = path.split('/').pop() ?? '';
    const dot = segment.indexOf('.');
    if (dot < 0) {
        return '';
    }
    return segment.slice(dot + 1);
}

/**
 * Reads the first integer in a string, e.g. `"37 results"` gives 37
 */
export function parseLeadingInt(text: string): number | undefined {
    const match = text.replace(/[,.](?=\d{3}\b)/g, '').match(/\d+/);
    return match ? parseInt(match[0], 10) : undefined;
}
