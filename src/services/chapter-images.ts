/**
 * Chapter Images Scraper for manga-harvester
 * Lists the page images of a chapter and assembles them into one document
 */

import { join } from 'node:path';

import { DOWNLOAD, NETWORK, SELECTORS } from '../config/constants';
import { FieldReader } from '../utils/dom';
import { withTempDir } from '../utils/fs';
import { runPool } from '../utils/pool';
import { getExtension, resolveUrl } from '../utils/text';
import { logger } from '../utils/logger';
import { NetworkManager } from './network';
import { AssemblyError, PdfBuilder, type DocumentAssembler } from './pdf-builder';
import type { ChapterImage, ProgressCallback, WarningHandler } from '../types';

/**
 * Raised when an image of a chapter cannot be downloaded.
 * No output document is written in that case.
 */
export class DownloadError extends Error {
    constructor(
        message: string,
        public readonly chapterUrl: string,
        public readonly imageUrl: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'DownloadError';
    }
}

export interface ChapterImagesOptions {
    assembler?: DocumentAssembler;
    /** Images downloaded at the same time */
    workers?: number;
    /** Parent directory for the per-chapter temp directory */
    tempRoot?: string;
    onWarning?: WarningHandler;
}

const KNOWN_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'webp', 'gif', 'avif', 'bmp', 'tif', 'tiff']);

/**
 * Local file name for an image, zero-padded so a directory listing keeps page order
 */
export function imageFileName(image: ChapterImage): string {
    const ext = getExtension(image.url).split('.').pop()?.toLowerCase() ?? '';
    const suffix = KNOWN_EXTENSIONS.has(ext) ? ext : 'img';
    return `${String(image.orderNo).padStart(4, '0')}.${suffix}`;
}

/**
 * ChapterImagesScraper handles one chapter.
 * The image list is fetched on first use and reused afterwards.
 */
export class ChapterImagesScraper {
    private images: Promise<readonly ChapterImage[]> | null = null;
    private readonly reader: FieldReader;
    private readonly assembler: DocumentAssembler;
    private readonly workers: number;
    private readonly tempRoot?: string;

    constructor(
        readonly url: string,
        private readonly network: NetworkManager,
        options?: ChapterImagesOptions
    ) {
        this.reader = new FieldReader('chapter', url, options?.onWarning);
        this.assembler = options?.assembler ?? new PdfBuilder();
        this.workers = options?.workers ?? DOWNLOAD.IMAGE_WORKERS;
        this.tempRoot = options?.tempRoot;
    }

    /**
     * Images of the chapter in display order, numbered from 1.
     * The list is shared between calls and frozen.
     *
     * @throws NetworkError if the chapter page cannot be fetched
     */
    getImages(): Promise<readonly ChapterImage[]> {
        if (!this.images) {
            this.images = this.fetchImages().catch((error: unknown) => {
                this.images = null;
                throw error;
            });
        }
        return this.images;
    }

    private async fetchImages(): Promise<readonly ChapterImage[]> {
        logger.debug(`Extracting images for ${this.url}`);
        const $ = await this.network.fetchDocument(this.url);
        const selector = SELECTORS.chapter.image;
        const images: ChapterImage[] = [];

        for (const node of $(selector).toArray()) {
            const src = ($(node).attr('src') ?? '').trim() || ($(node).attr('data-src') ?? '').trim();
            if (!src) {
                this.reader.warn('image.url', selector);
                continue;
            }
            images.push({ orderNo: images.length + 1, url: resolveUrl(this.url, src) });
        }

        return Object.freeze(images);
    }

    /**
     * Downloads every image of the chapter into a temp directory and
     * assembles them, in order, into `outputPath`. The temp directory is
     * removed whether this succeeds or fails.
     *
     * @throws AssemblyError if the chapter has no images or assembly fails
     * @throws DownloadError naming the first image that could not be downloaded
     */
    async downloadAsDocument(outputPath: string, onProgress?: ProgressCallback): Promise<void> {
        const images = await this.getImages();
        if (images.length === 0) {
            throw new AssemblyError(`Chapter ${this.url} has no images to assemble`, outputPath);
        }

        await withTempDir(
            DOWNLOAD.TEMP_PREFIX,
            async (dir) => {
                const paths = await this.downloadImages(images, dir, onProgress);
                logger.debug(`Assembling ${paths.length} images into ${outputPath}`);
                await this.assembler.assemble(paths, outputPath);
            },
            this.tempRoot
        );
    }

    /**
     * Downloads all images and waits for every download to settle before
     * reporting the first failure in page order
     */
    private async downloadImages(
        images: readonly ChapterImage[],
        dir: string,
        onProgress?: ProgressCallback
    ): Promise<string[]> {
        let done = 0;
        const settled = await runPool(images, this.workers, async (image) => {
            const savePath = join(dir, imageFileName(image));
            await this.network.downloadToFile(image.url, savePath, { timeout: NETWORK.IMAGE_TIMEOUT });
            done++;
            onProgress?.(done, images.length);
            return savePath;
        });

        return images.map((image, index) => {
            const result = settled[index];
            if (result.ok) {
                return result.value;
            }
            logger.error(`Failed to download ${image.url}: ${result.error.message}`);
            throw new DownloadError(
                `Failed to download image ${image.orderNo} of ${this.url}: ${image.url}`,
                this.url,
                image.url,
                { cause: result.error }
            );
        });
    }
}
