import { MediaType, Query } from '../pipeline/types';

const YEAR_SUFFIX = /\s*\((\d{4})\)\s*$/;
const MEDIA_TAG_SUFFIX = /\s*\[(movie|tv)\]\s*$/i;

/**
 * Parses one input title. A trailing "(YYYY)" becomes the year hint and a
 * trailing "[movie]" or "[tv]" tag becomes the media type hint, in either order.
 */
export function parseQuery(line: string): Query {
    const raw = line.trim();
    let text = raw;
    let yearHint: number | undefined;
    let mediaTypeHint: MediaType | undefined;

    for (let pass = 0; pass < 2; pass++) {
        const tag = mediaTypeHint === undefined ? MEDIA_TAG_SUFFIX.exec(text) : null;
        if (tag) {
            mediaTypeHint = tag[1].toLowerCase() === 'tv' ? 'tv' : 'movie';
            text = text.slice(0, tag.index);
            continue;
        }

        const year = yearHint === undefined ? YEAR_SUFFIX.exec(text) : null;
        if (year) {
            yearHint = Number(year[1]);
            text = text.slice(0, year.index);
        }
    }

    text = text.trim();
    if (!text) {
        return { raw, text: raw, mediaTypeHint: 'unspecified' };
    }

    return {
        raw,
        text,
        ...(yearHint !== undefined ? { yearHint } : {}),
        mediaTypeHint: mediaTypeHint ?? 'unspecified',
    };
}

export function toQueries(titles: Iterable<string>): Query[] {
    const queries: Query[] = [];
    for (const title of titles) {
        if (title.trim()) queries.push(parseQuery(title));
    }
    return queries;
}
