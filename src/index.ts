// Main entry point for manga-harvester

import { join } from 'node:path';

import { PATHS } from './config/constants';
import { formatFilename } from './utils/text';
import { NetworkManager, getNetworkManager } from './services/network';
import { SearchScraper } from './services/search';
import { MangaDetailsScraper } from './services/details';
import { ChapterImagesScraper } from './services/chapter-images';
import { CatalogWalker } from './services/catalog';
import { MangaDownloader } from './services/downloader';
import type { ChapterImage, DownloadSummary, MangaDetails, SearchPage } from './types';

export type {
    ChapterLatest,
    ChapterDetailed,
    ChapterImage,
    MangaSearchResult,
    MangaDetails,
    MangaMetadata,
    SearchPage,
    DownloadSummary,
    ParseWarning,
    WarningHandler,
    FetchLike,
    FetchOptions,
    NetworkOptions,
    ProgressCallback,
} from './types';

export {
    NetworkManager,
    NetworkError,
    getNetworkManager,
    closeNetworkManager,
    type ReadBody,
} from './services/network';
export { SearchScraper } from './services/search';
export { MangaDetailsScraper } from './services/details';
export { ChapterImagesScraper, DownloadError } from './services/chapter-images';
export { PdfBuilder, AssemblyError, type DocumentAssembler } from './services/pdf-builder';
export { CatalogWalker } from './services/catalog';
export { MangaDownloader } from './services/downloader';

/**
 * Searches the catalog; only the requested page is fetched
 */
export function search(
    query: string,
    page: number = 1,
    network: NetworkManager = getNetworkManager()
): Promise<SearchPage> {
    return new SearchScraper(network).search(query, page);
}

/**
 * Full details of one manga
 */
export function getDetails(url: string, network: NetworkManager = getNetworkManager()): Promise<MangaDetails> {
    return new MangaDetailsScraper(url, network).getDetails();
}

/**
 * Images of one chapter in display order
 */
export function getChapterImages(
    chapterUrl: string,
    network: NetworkManager = getNetworkManager()
): Promise<readonly ChapterImage[]> {
    return new ChapterImagesScraper(chapterUrl, network).getImages();
}

/**
 * Downloads a chapter's images and writes them as one PDF at `outputPath`
 */
export function downloadChapterAsDocument(
    chapterUrl: string,
    outputPath: string,
    network: NetworkManager = getNetworkManager()
): Promise<void> {
    return new ChapterImagesScraper(chapterUrl, network).downloadAsDocument(outputPath);
}

/**
 * Every manga URL in the catalog
 */
export async function enumerateCatalog(network: NetworkManager = getNetworkManager()): Promise<Set<string>> {
    const walker = new CatalogWalker(network);
    const totalPages = await walker.getTotalPages();
    return walker.start(totalPages);
}

/**
 * Downloads every chapter of a manga into `<baseFolder>/<title>/` with a metadata.json
 */
export async function downloadManga(
    url: string,
    baseFolder: string = PATHS.DATA_DIR,
    network: NetworkManager = getNetworkManager()
): Promise<DownloadSummary> {
    const details = await getDetails(url, network);
    const folder = join(baseFolder, formatFilename(details.title) || 'manga');
    const downloader = new MangaDownloader(details, folder, network);
    await downloader.createMetadataFile();
    return downloader.downloadChapters();
}
