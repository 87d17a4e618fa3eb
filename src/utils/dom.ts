/**
 * Optional-value accessors over parsed markup.
 * A missing element yields `undefined`; FieldReader turns that into an
 * empty value and reports a ParseWarning.
 */

import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';

import type { ParseWarning, WarningHandler } from '../types';
import { cleanText, resolveUrl } from './text';
import { logger } from './logger';

/**
 * Text of the first element matching `selector` under `root`
 */
export function selectText<T extends AnyNode>(root: Cheerio<T>, selector: string): string | undefined {
    const node = root.find(selector).first();
    if (node.length === 0) {
        return undefined;
    }
    return cleanText(node.text());
}

/**
 * First non-empty attribute among `names` on the first element matching `selector`
 */
export function selectAttr<T extends AnyNode>(
    root: Cheerio<T>,
    selector: string,
    names: readonly string[]
): string | undefined {
    const node = root.find(selector).first();
    if (node.length === 0) {
        return undefined;
    }
    for (const name of names) {
        const value = node.attr(name)?.trim();
        if (value) {
            return value;
        }
    }
    return undefined;
}

/**
 * Texts of every element matching `selector`, in document order
 */
export function selectTexts<T extends AnyNode>(root: Cheerio<T>, selector: string): string[] {
    const nodes = root.find(selector);
    return Array.from({ length: nodes.length }, (_, i) => cleanText(nodes.eq(i).text()))
        .filter((text) => text.length > 0);
}

/**
 * Logs a parse warning at warn level
 */
export const logWarning: WarningHandler = (warning: ParseWarning) => {
    logger.warn(
        `[${warning.scope}] missing ${warning.field} (${warning.selector}) on ${warning.url}`
    );
};

/**
 * Reads record fields for one page, substituting empty values for
 * missing elements and reporting each gap once through `onWarning`.
 */
export class FieldReader {
    constructor(
        private readonly scope: ParseWarning['scope'],
        private readonly url: string,
        private readonly onWarning: WarningHandler = logWarning
    ) {}

    text<T extends AnyNode>(root: Cheerio<T>, field: string, selector: string): string {
        const value = selectText(root, selector);
        if (value === undefined) {
            this.warn(field, selector);
            return '';
        }
        return value;
    }

    /**
     * Attribute value resolved against the page URL
     */
    link<T extends AnyNode>(
        root: Cheerio<T>,
        field: string,
        selector: string,
        names: readonly string[] = ['href']
    ): string {
        const value = selectAttr(root, selector, names);
        if (value === undefined) {
            this.warn(field, selector);
            return '';
        }
        return resolveUrl(this.url, value);
    }

    /**
     * Plain attribute value, or '' without a warning when absent
     */
    attr<T extends AnyNode>(root: Cheerio<T>, selector: string, names: readonly string[]): string {
        return selectAttr(root, selector, names) ?? '';
    }

    /**
     * Texts of every match; warns when nothing matches at all
     */
    list<T extends AnyNode>(root: Cheerio<T>, field: string, selector: string): string[] {
        if (root.find(selector).length === 0) {
            this.warn(field, selector);
            return [];
        }
        return selectTexts(root, selector);
    }

    warn(field: string, selector: string): void {
        this.onWarning({ scope: this.scope, field, selector, url: this.url });
    }
}
