// TMDB endpoints
export const TMDB_API_BASE_URL = 'https://api.themoviedb.org/3';
export const TMDB_IMAGE_BASE_URL = 'https://image.tmdb.org/t/p';

// Files written into the output directory
export const FAILED_REPORT_FILENAME = 'failed_downloads.txt';
export const METADATA_SUFFIX = '_metadata.json';
export const PARTIAL_SUFFIX = '.part';

// Poster paths from TMDB are almost always JPEGs
export const DEFAULT_IMAGE_EXTENSION = '.jpg';
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp'];

export const MAX_FILENAME_LENGTH = 200;
export const MAX_BACKOFF_MS = 30_000;
