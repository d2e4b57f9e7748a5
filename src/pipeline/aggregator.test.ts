import fs from 'fs';
import os from 'os';
import path from 'path';

jest.mock('../util/logger', () => ({
    __esModule: true,
    default: {
        info: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
        warn: jest.fn(),
    }
}));

import { ResultAggregator, buildMetadata, formatFailureReport } from './aggregator';
import { sidecarPathFor } from '../util/files';
import { parseQuery } from '../input/query';
import { DownloadOutcome, FailureOutcome, ResolvedAsset, SuccessOutcome } from './types';

const heatAsset: ResolvedAsset = {
    query: parseQuery('Heat (1995)'),
    candidate: {
        id: 949,
        title: 'Heat',
        releaseYear: 1995,
        mediaType: 'movie',
        posterPath: '/heat.jpg',
        language: 'en-US',
        popularity: 40,
        overview: 'A heist.',
    },
    quality: 'w500',
    imageUrl: 'https://images.test/w500/heat.jpg',
};

function failure(raw: string, reason: FailureOutcome['reason'], message: string): FailureOutcome {
    return { status: 'failure', query: parseQuery(raw), reason, message, retriesAttempted: 0 };
}

describe('buildMetadata', () => {
    it('should describe the match with nulls for unknown fields', () => {
        expect(buildMetadata(heatAsset, new Date('2026-01-02T03:04:05.000Z'))).toEqual({
            query: 'Heat (1995)',
            matchedId: 949,
            matchedTitle: 'Heat',
            originalTitle: null,
            mediaType: 'movie',
            releaseYear: 1995,
            language: 'en-US',
            quality: 'w500',
            sourceUrl: 'https://images.test/w500/heat.jpg',
            popularity: 40,
            voteAverage: null,
            overview: 'A heist.',
            downloadedAt: '2026-01-02T03:04:05.000Z',
        });
    });
});

describe('formatFailureReport', () => {
    const rule = '='.repeat(50);

    it('should list each failure with its reason', () => {
        const report = formatFailureReport([
            failure('Nothing Here', 'NoMatch', 'No movie results in en'),
            failure('Heat', 'DownloadFailed', 'Image request failed (HTTP 404)'),
        ]);

        expect(report).toBe([
            rule,
            'FAILED POSTER DOWNLOADS',
            rule,
            '',
            'Total failed: 2',
            '',
            '- Nothing Here [NoMatch] No movie results in en',
            '- Heat [DownloadFailed] Image request failed (HTTP 404)',
            '',
        ].join('\n'));
    });

    it('should say so when nothing failed', () => {
        expect(formatFailureReport([])).toBe(`${rule}\nFAILED POSTER DOWNLOADS\n${rule}\n\nNo failed downloads.\n`);
    });
});

describe('ResultAggregator', () => {
    let root: string;
    let outputDir: string;

    async function savedImage(name: string): Promise<string> {
        const file = path.join(outputDir, name);
        await fs.promises.mkdir(outputDir, { recursive: true });
        await fs.promises.writeFile(file, `image:${name}`);
        return file;
    }

    function success(raw: string, savedPath: string, extra: Partial<SuccessOutcome> = {}): SuccessOutcome {
        return { status: 'success', query: parseQuery(raw), savedPath, skipped: false, bytes: 10, ...extra };
    }

    beforeEach(async () => {
        root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'marquee-aggregate-'));
        outputDir = path.join(root, 'posters');
    });

    afterEach(async () => {
        await fs.promises.rm(root, { recursive: true, force: true });
    });

    it('should write a sidecar beside freshly downloaded images', async () => {
        const image = await savedImage('Heat_1995.jpg');
        const metadata = buildMetadata(heatAsset);
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: true, zipOutput: false });

        const recorded = await aggregator.record(success('Heat (1995)', image, { metadata }));

        const sidecar = path.join(outputDir, 'Heat_1995_metadata.json');
        expect(recorded).toMatchObject({ status: 'success', sidecarPath: sidecar });
        expect(JSON.parse(await fs.promises.readFile(sidecar, 'utf8'))).toEqual(metadata);
    });

    it('should not write sidecars for skipped images or when disabled', async () => {
        const image = await savedImage('Heat_1995.jpg');
        const metadata = buildMetadata(heatAsset);

        await new ResultAggregator({ outputDir, saveMetadata: true, zipOutput: false })
            .record(success('Heat (1995)', image, { metadata, skipped: true }));
        await new ResultAggregator({ outputDir, saveMetadata: false, zipOutput: false })
            .record(success('Heat (1995)', image, { metadata }));

        expect(await fs.promises.readdir(outputDir)).toEqual(['Heat_1995.jpg']);
    });

    it('should record a WriteFailed failure when the sidecar cannot be written', async () => {
        const image = await savedImage('Heat_1995.jpg');
        // A directory where the sidecar should go makes the rename fail.
        await fs.promises.mkdir(sidecarPathFor(image));
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: true, zipOutput: true });

        const recorded = await aggregator.record(success('Heat (1995)', image, { metadata: buildMetadata(heatAsset) }));

        expect(recorded).toMatchObject({ status: 'failure', reason: 'WriteFailed', strandedPath: image });
        expect(aggregator.results).toEqual([recorded]);

        const result = await aggregator.finalize();
        const reportPath = path.join(outputDir, 'failed_downloads.txt');
        expect(result.archivePath).toBeUndefined();
        expect(result.failureReportPath).toBe(reportPath);
        expect(await fs.promises.readFile(reportPath, 'utf8')).toContain('- Heat (1995) [WriteFailed] Failed to write');
    });

    it('should archive successes with their sidecars and leave failures out', async () => {
        const heat = await savedImage('Heat_1995.jpg');
        const up = await savedImage('Up.jpg');
        const stray = await savedImage('Parasite_2019.jpg');
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: true, zipOutput: true });

        await aggregator.record(success('Heat (1995)', heat, { metadata: buildMetadata(heatAsset) }));
        await aggregator.record(success('Up', up, { skipped: true, bytes: 0 }));
        await aggregator.record({ ...failure('Parasite (2019)', 'WriteFailed', 'Failed to write'), strandedPath: stray });

        const result = await aggregator.finalize();

        expect(result.archivePath).toBe(`${path.resolve(outputDir)}.zip`);
        expect(result.archivedFiles).toEqual(['Heat_1995.jpg', 'Heat_1995_metadata.json', 'Up.jpg']);

        const zip = await fs.promises.readFile(`${outputDir}.zip`);
        expect(zip.subarray(0, 2).toString()).toBe('PK');
        expect(zip.includes('Heat_1995_metadata.json')).toBe(true);
        expect(zip.includes('Up.jpg')).toBe(true);
        expect(zip.includes('Parasite_2019.jpg')).toBe(false);

        expect((await fs.promises.readdir(outputDir)).sort()).toEqual([
            'Heat_1995.jpg',
            'Heat_1995_metadata.json',
            'Parasite_2019.jpg',
            'Up.jpg',
            'failed_downloads.txt',
        ]);
    });

    it('should skip the archive when nothing succeeded but still write the report', async () => {
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: true, zipOutput: true });
        const outcomes: DownloadOutcome[] = [failure('Nothing Here', 'NoMatch', 'No results')];
        for (const outcome of outcomes) await aggregator.record(outcome);

        const result = await aggregator.finalize();

        expect(result).toEqual({ failureReportPath: path.join(outputDir, 'failed_downloads.txt'), archivedFiles: [] });
        expect(fs.existsSync(`${outputDir}.zip`)).toBe(false);
    });

    it('should list duplicate queries once in the archive', async () => {
        const up = await savedImage('Up.jpg');
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: false, zipOutput: true });

        await aggregator.record(success('Up', up));
        await aggregator.record(success('Up', up, { skipped: true }));

        expect((await aggregator.finalize()).archivedFiles).toEqual(['Up.jpg']);
    });

    it('should report an archive that could not be written instead of throwing', async () => {
        const up = await savedImage('Up.jpg');
        const archivePath = `${path.resolve(outputDir)}.zip`;
        await fs.promises.mkdir(archivePath);
        await fs.promises.writeFile(path.join(archivePath, 'keep.txt'), 'occupied');
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: false, zipOutput: true });
        await aggregator.record(success('Up', up));

        const result = await aggregator.finalize();

        expect(result.archivePath).toBeUndefined();
        expect(result.archivedFiles).toEqual([]);
        expect(result.archiveError).toContain(`Failed to write ${archivePath}: `);
        expect(result.failureReportPath).toBe(path.join(outputDir, 'failed_downloads.txt'));
        expect((await fs.promises.readdir(root)).sort()).toEqual(['posters', 'posters.zip']);
    });

    it('should report a failure report that could not be written and still archive', async () => {
        const up = await savedImage('Up.jpg');
        const reportPath = path.join(outputDir, 'failed_downloads.txt');
        await fs.promises.mkdir(reportPath);
        await fs.promises.writeFile(path.join(reportPath, 'keep.txt'), 'occupied');
        const aggregator = new ResultAggregator({ outputDir, saveMetadata: false, zipOutput: true });
        await aggregator.record(success('Up', up));

        const result = await aggregator.finalize();

        expect(result.failureReportPath).toBeUndefined();
        expect(result.failureReportError).toContain(`Failed to write ${reportPath}: `);
        expect(result.archivePath).toBe(`${path.resolve(outputDir)}.zip`);
        expect(result.archivedFiles).toEqual(['Up.jpg']);
    });
});
