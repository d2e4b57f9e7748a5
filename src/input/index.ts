import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { parse } from 'csv-parse/sync';
import logger from '../util/logger';
import { EmptyInputError, MalformedInputError, describeError } from '../util/errors';
import { parseCommaList } from '../util/naming';
import { Query } from '../pipeline/types';
import { toQueries } from './query';

export { parseQuery, toQueries } from './query';

export type InputFormat = 'text' | 'json' | 'csv';

export interface ParseOptions {
    format?: InputFormat | 'auto';
    /** Skip the first CSV row. */
    csvHasHeader?: boolean;
}

const EXTENSION_FORMATS: Record<string, InputFormat> = {
    '.txt': 'text',
    '.json': 'json',
    '.csv': 'csv',
};

const TitleListSchema = z.union([
    z.array(z.string()),
    z.object({ titles: z.array(z.string()) }).transform(data => data.titles),
]);

/**
 * Picks a format from the file extension, falling back to the content:
 * a leading "[" or "{" means JSON, anything else is plain text.
 */
export function detectInputFormat(filePath: string, content: string): InputFormat {
    const byExtension = EXTENSION_FORMATS[path.extname(filePath).toLowerCase()];
    if (byExtension) return byExtension;

    const firstChar = content.replace(/^\uFEFF/, '').trimStart().charAt(0);
    return firstChar === '[' || firstChar === '{' ? 'json' : 'text';
}

export function parseTextTitles(content: string): string[] {
    return content.split(/\r?\n/);
}

export function parseJsonTitles(content: string): string[] {
    let data: unknown;
    try {
        data = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (e) {
        throw new MalformedInputError(`invalid JSON (${describeError(e)})`, { cause: e });
    }

    const result = TitleListSchema.safeParse(data);
    if (!result.success) {
        throw new MalformedInputError('JSON must be an array of strings or an object with a "titles" array of strings');
    }
    return result.data;
}

export function parseCsvTitles(content: string, hasHeader: boolean = false): string[] {
    let rows: string[][];
    try {
        rows = parse(content, {
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
            trim: true,
        });
    } catch (e) {
        throw new MalformedInputError(`invalid CSV (${describeError(e)})`, { cause: e });
    }

    const dataRows = hasHeader ? rows.slice(1) : rows;
    return dataRows.map(row => row[0] ?? '');
}

/** Parses already-loaded file content in the given format. */
export function parseTitles(content: string, format: InputFormat, options: ParseOptions = {}): Query[] {
    switch (format) {
        case 'text':
            return toQueries(parseTextTitles(content));
        case 'json':
            return toQueries(parseJsonTitles(content));
        case 'csv':
            return toQueries(parseCsvTitles(content, options.csvHasHeader));
    }
}

/**
 * Reads an input file into an ordered list of queries (duplicates kept).
 * Throws MalformedInputError when the file cannot be read or parsed and
 * EmptyInputError when it yields no titles.
 */
export async function loadQueriesFromFile(filePath: string, options: ParseOptions = {}): Promise<Query[]> {
    let content: string;
    try {
        content = await fs.promises.readFile(filePath, 'utf8');
    } catch (e) {
        throw new MalformedInputError(`cannot read ${filePath} (${describeError(e)})`, { cause: e });
    }

    const format = !options.format || options.format === 'auto'
        ? detectInputFormat(filePath, content)
        : options.format;

    logger.info(`Loading titles from ${path.basename(filePath)} (format: ${format})...`);
    const queries = parseTitles(content, format, options);

    if (queries.length === 0) {
        throw new EmptyInputError(filePath);
    }

    logger.info(`Loaded ${queries.length} titles.`);
    return queries;
}

/** Parses a comma-separated inline list such as "Breaking Bad, The Office, Arcane". */
export function parseInlineTitles(value: string | string[]): Query[] {
    const titles = typeof value === 'string' ? parseCommaList(value) : value;
    const queries = toQueries(titles);
    if (queries.length === 0) {
        throw new EmptyInputError('inline title list');
    }
    return queries;
}
