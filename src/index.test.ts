jest.mock('./util/logger', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }
}));

const mockVerifyApiKey = jest.fn();

jest.mock('./api/tmdb', () => ({
  TmdbClient: jest.fn().mockImplementation(() => ({ verifyApiKey: mockVerifyApiKey })),
}));

jest.mock('./util/config', () => ({
  loadConfig: jest.fn(),
}));

jest.mock('./pipeline', () => ({
  createPosterRun: jest.fn(),
  loadQueries: jest.fn(),
}));

import { logProgress, logSummary, main } from './index';
import logger from './util/logger';
import { loadConfig } from './util/config';
import { createPosterRun, loadQueries } from './pipeline';
import { toQueries } from './input/query';
import { AuthFailureError } from './util/errors';

describe('command line entry', () => {
  const execute = jest.fn();
  const baseConfig = {
    apiKey: 'test-secret',
    requestDelaySeconds: 0.5,
    requestTimeoutSeconds: 15,
    verifyApiKey: true,
  };

  function report(state: 'Completed' | 'Aborted') {
    return {
      runId: 'abc123',
      state,
      cancelled: false,
      outcomes: [],
      summary: { total: 0, succeeded: 0, downloaded: 0, skipped: 0, duplicates: 0, failed: 0, aborted: 0, cancelled: 0, bytesDownloaded: 0 },
      failureReportPath: 'output/posters/failed_downloads.txt',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:01.000Z',
    };
  }

  beforeEach(() => {
    jest.clearAllMocks();
    jest.mocked(loadConfig).mockReturnValue({
      run: baseConfig,
      input: { format: 'auto', csvHasHeader: false, titles: ['Heat'] },
    } as unknown as ReturnType<typeof loadConfig>);
    jest.mocked(loadQueries).mockResolvedValue(toQueries(['Heat']));
    jest.mocked(createPosterRun).mockReturnValue({ execute } as unknown as ReturnType<typeof createPosterRun>);
    mockVerifyApiKey.mockResolvedValue(undefined);
  });

  it('should verify the key, run and exit cleanly', async () => {
    execute.mockResolvedValue(report('Completed'));

    await expect(main()).resolves.toBe(0);

    expect(mockVerifyApiKey).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledWith(expect.objectContaining({ onProgress: logProgress }));
  });

  it('should exit with 1 when the run aborts', async () => {
    execute.mockResolvedValue(report('Aborted'));

    await expect(main()).resolves.toBe(1);
  });

  it('should not start a run when the key is rejected', async () => {
    mockVerifyApiKey.mockRejectedValue(new AuthFailureError('TMDB rejected the API key: Invalid API key'));

    await expect(main()).rejects.toThrow(AuthFailureError);
    expect(createPosterRun).not.toHaveBeenCalled();
  });

  it('should log progress lines with an estimate', () => {
    const [heat, up] = toQueries(['Heat', 'Up']);

    logProgress({
      index: 1,
      total: 2,
      elapsedMs: 5000,
      etaMs: 5000,
      outcome: { status: 'success', query: heat, savedPath: '/tmp/posters/Heat.jpg', skipped: false, bytes: 10 },
    });
    logProgress({
      index: 2,
      total: 2,
      elapsedMs: 9000,
      etaMs: 0,
      outcome: { status: 'failure', query: up, reason: 'NoMatch', message: 'No movie results in en', retriesAttempted: 0 },
    });

    expect(logger.info).toHaveBeenCalledWith('[1/2] Heat: saved Heat.jpg (ETA 5s)');
    expect(logger.warn).toHaveBeenCalledWith('[2/2] Up: NoMatch - No movie results in en');
  });

  it('should report an archive that could not be created', () => {
    logSummary({
      ...report('Completed'),
      archiveError: 'Failed to write /tmp/posters.zip: EISDIR',
    });

    expect(logger.warn).toHaveBeenCalledWith('Archive not created: Failed to write /tmp/posters.zip: EISDIR');
    expect(logger.info).toHaveBeenCalledWith('Failure report: output/posters/failed_downloads.txt');
  });
});
