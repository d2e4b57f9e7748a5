import { MAX_FILENAME_LENGTH } from './constants';

export const UNTITLED = 'untitled';

/**
 * Turns a title into a filesystem-safe base name. Letters and digits of any
 * script are kept; Latin accents are dropped.
 * "Amélie (2001)" -> "Amelie_2001", "君の名は。" -> "君の名は"; anything that
 * cleans down to nothing becomes "untitled".
 */
export function sanitizeFilename(title: string, maxLength: number = MAX_FILENAME_LENGTH): string {
    if (!title.trim()) {
        return UNTITLED;
    }

    const sanitized = title
        .normalize('NFKD')
        .replace(/(\p{Script=Latin})[\u0300-\u036f]+/gu, '$1')
        .normalize('NFC')
        .replace(/[<>:"/\\|?*]/g, '_')
        .replace(/\s+/g, '_')
        .replace(/[^\p{L}\p{M}\p{N}_-]/gu, '')
        .replace(/_{2,}/g, '_')
        .replace(/^[_-]+|[_-]+$/g, '');

    // Slice by code point so a surrogate pair is never cut in half.
    return Array.from(sanitized).slice(0, maxLength).join('') || UNTITLED;
}

export function parseCommaList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}
