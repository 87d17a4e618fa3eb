/**
 * Manga Downloader for manga-harvester
 * Downloads the chapters of one manga as PDFs into a folder with its metadata
 */

import { join } from 'node:path';

import { PATHS } from '../config/constants';
import { ensureDir, fileExistsWithContent, writeJson } from '../utils/fs';
import { formatFilename } from '../utils/text';
import { logger } from '../utils/logger';
import { NetworkManager } from './network';
import { ChapterImagesScraper, type ChapterImagesOptions } from './chapter-images';
import type {
    ChapterDetailed,
    DownloadSummary,
    MangaDetails,
    MangaMetadata,
    ProgressCallback,
} from '../types';

/**
 * File name of a chapter PDF, e.g. `0003_Chapter_3.pdf`
 */
export function chapterFileName(chapter: ChapterDetailed): string {
    const title = formatFilename(chapter.title) || 'chapter';
    return `${String(chapter.orderNo).padStart(4, '0')}_${title}.pdf`;
}

/**
 * MangaDownloader handles downloading the chapters of one manga.
 * Chapters already on disk are skipped, and a failing chapter does not
 * stop the others.
 */
export class MangaDownloader {
    constructor(
        private readonly details: MangaDetails,
        private readonly baseFolder: string,
        private readonly network: NetworkManager,
        private readonly chapterOptions?: ChapterImagesOptions
    ) {}

    /**
     * Writes metadata.json with the details and the chapter file names
     */
    async createMetadataFile(): Promise<string> {
        const metadata: MangaMetadata = {
            ...this.details,
            downloadedAt: new Date().toISOString(),
            chapterFiles: this.details.chapters.map(chapterFileName),
        };
        const metaPath = join(this.baseFolder, PATHS.METADATA_FILE);
        await writeJson(metaPath, metadata);
        return metaPath;
    }

    /**
     * Downloads chapters one after another
     *
     * @param chapters - Chapters to download, all chapters by default
     * @param onProgress - Called after each chapter
     */
    async downloadChapters(
        chapters: readonly ChapterDetailed[] = this.details.chapters,
        onProgress?: ProgressCallback
    ): Promise<DownloadSummary> {
        await ensureDir(this.baseFolder);
        const summary: DownloadSummary = { downloaded: 0, skipped: 0, failed: [] };

        for (const [index, chapter] of chapters.entries()) {
            const outputPath = join(this.baseFolder, chapterFileName(chapter));

            if (await fileExistsWithContent(outputPath)) {
                summary.skipped++;
            } else {
                try {
                    const scraper = new ChapterImagesScraper(chapter.url, this.network, this.chapterOptions);
                    await scraper.downloadAsDocument(outputPath);
                    summary.downloaded++;
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    logger.error(`Failed to download chapter ${chapter.title}: ${message}`);
                    summary.failed.push({ url: chapter.url, error: message });
                }
            }

            onProgress?.(index + 1, chapters.length);
        }

        return summary;
    }

    getBaseFolder(): string {
        return this.baseFolder;
    }
}
