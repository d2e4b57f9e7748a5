import { parseQuery, toQueries } from './query';

describe('parseQuery', () => {
    it('should extract a trailing year as the year hint', () => {
        expect(parseQuery('Parasite (2019)')).toEqual({
            raw: 'Parasite (2019)',
            text: 'Parasite',
            yearHint: 2019,
            mediaTypeHint: 'unspecified',
        });
    });

    it('should leave titles without hints untouched', () => {
        expect(parseQuery('  Spirited Away  ')).toEqual({
            raw: 'Spirited Away',
            text: 'Spirited Away',
            mediaTypeHint: 'unspecified',
        });
    });

    it('should read a media type tag before or after the year', () => {
        const tagLast = parseQuery('Dune (2021) [movie]');
        const tagFirst = parseQuery('Arcane [TV] (2021)');

        expect(tagLast).toMatchObject({ text: 'Dune', yearHint: 2021, mediaTypeHint: 'movie' });
        expect(tagFirst).toMatchObject({ text: 'Arcane', yearHint: 2021, mediaTypeHint: 'tv' });
    });

    it('should only treat a year at the end as a hint', () => {
        const query = parseQuery('2001: A Space Odyssey');
        expect(query.text).toBe('2001: A Space Odyssey');
        expect(query.yearHint).toBeUndefined();
    });

    it('should keep the raw text when stripping hints leaves nothing', () => {
        expect(parseQuery('(2019)')).toEqual({
            raw: '(2019)',
            text: '(2019)',
            mediaTypeHint: 'unspecified',
        });
    });
});

describe('toQueries', () => {
    it('should skip blank titles and keep duplicates in order', () => {
        const queries = toQueries(['Up', '', '   ', 'Heat (1995)', 'Up']);
        expect(queries.map(q => q.text)).toEqual(['Up', 'Heat', 'Up']);
    });
});
