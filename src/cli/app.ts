/**
 * CLI Application for manga-harvester
 */

import { join } from 'node:path';
import { select, checkbox, input } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';

import { NetworkManager } from '../services/network';
import { SearchScraper } from '../services/search';
import { MangaDetailsScraper } from '../services/details';
import { ChapterImagesScraper } from '../services/chapter-images';
import { CatalogWalker } from '../services/catalog';
import { MangaDownloader } from '../services/downloader';
import { PATHS } from '../config/constants';
import { formatFilename } from '../utils/text';
import type { DownloadSummary, MangaDetails, SearchPage } from '../types';

/**
 * Prints one page of search results
 */
export function printSearchPage(result: SearchPage): void {
    console.log(
        chalk.cyan(`\n${result.resultCount} results for "${result.query}" (page ${result.page}/${result.pages})\n`)
    );
    for (const manga of result.results) {
        console.log(`${chalk.bold(manga.title)} ${chalk.gray(`[${manga.status}] ★ ${manga.rate || '-'}`)}`);
        console.log(`  ${manga.url}`);
        if (manga.genres.length > 0) {
            console.log(chalk.gray(`  ${manga.genres.join(', ')}`));
        }
        if (manga.latestChapter.title) {
            console.log(chalk.gray(`  Latest: ${manga.latestChapter.title}`));
        }
    }
}

/**
 * Prints a manga's details and chapter list
 */
export function printDetails(details: MangaDetails): void {
    console.log(chalk.cyan(`\n📖 ${details.title}`));
    console.log(`Status: ${details.status || '-'}   Rating: ${details.rate || '-'}`);
    console.log(`Genres: ${details.genres.join(', ') || '-'}`);
    console.log(`Poster: ${details.poster || '-'}`);
    if (details.description) {
        console.log(`\n${details.description}`);
    }
    console.log(chalk.cyan(`\n${details.chapters.length} chapters`));
    for (const chapter of details.chapters) {
        console.log(`  ${String(chapter.orderNo).padStart(4)}  ${chapter.title}  ${chalk.gray(chapter.url)}`);
    }
}

/**
 * Interactive menu shown when the CLI runs without a command
 */
export class Application {
    constructor(private readonly network: NetworkManager) {}

    /**
     * Main entry point for the interactive mode
     */
    async run(): Promise<void> {
        console.log(chalk.cyan('\n📚 Manga Harvester\n'));

        try {
            const action = await this.showMainMenu();
            await this.handleAction(action);
        } catch (error) {
            if (error instanceof Error && error.name === 'ExitPromptError') {
                console.log(chalk.yellow('\nGoodbye! 👋'));
                return;
            }
            throw error;
        }
    }

    private async showMainMenu(): Promise<string> {
        return select({
            message: 'Select Action:',
            choices: [
                { name: 'Search', value: 'search' },
                { name: 'Show manga details', value: 'details' },
                { name: 'Download chapters as PDF', value: 'download' },
                { name: 'Enumerate catalog', value: 'catalog' },
            ],
        });
    }

    private async handleAction(action: string): Promise<void> {
        switch (action) {
            case 'search':
                await this.handleSearch();
                break;
            case 'details':
                await this.handleDetails(await this.askUrl('Manga URL:'));
                break;
            case 'download':
                await this.handleDownload(await this.askUrl('Manga URL:'));
                break;
            case 'catalog':
                await this.handleCatalog();
                break;
        }
    }

    private async askUrl(message: string): Promise<string> {
        return input({
            message,
            validate: (value) => {
                try {
                    new URL(value);
                    return true;
                } catch {
                    return 'Please enter a valid URL';
                }
            },
        });
    }

    private async handleSearch(): Promise<void> {
        const query = await input({ message: 'Search for:' });
        const scraper = new SearchScraper(this.network);
        let page = 1;

        for (;;) {
            const spinner = ora(`Searching "${query}" (page ${page})...`).start();
            let result: SearchPage;
            try {
                result = await scraper.search(query, page);
                spinner.stop();
            } catch (error) {
                spinner.fail(chalk.red('Search failed'));
                throw error;
            }
            printSearchPage(result);

            if (page >= result.pages) {
                return;
            }
            const next = await select({
                message: 'Next:',
                choices: [
                    { name: 'Next page', value: true },
                    { name: 'Done', value: false },
                ],
            });
            if (!next) {
                return;
            }
            page++;
        }
    }

    private async loadDetails(url: string): Promise<MangaDetails> {
        const spinner = ora('Fetching manga details...').start();
        try {
            const details = await new MangaDetailsScraper(url, this.network).getDetails();
            spinner.succeed(`Found: ${details.title}`);
            return details;
        } catch (error) {
            spinner.fail(chalk.red('Failed to fetch manga details'));
            throw error;
        }
    }

    private async handleDetails(url: string): Promise<void> {
        printDetails(await this.loadDetails(url));
    }

    private async handleDownload(url: string): Promise<void> {
        const details = await this.loadDetails(url);
        if (details.chapters.length === 0) {
            console.log(chalk.yellow('This manga lists no chapters.'));
            return;
        }

        const selected = await checkbox({
            message: 'Select Chapters to download:',
            choices: details.chapters.map((chapter, index) => ({ name: chapter.title, value: index })),
        });
        if (selected.length === 0) {
            console.log(chalk.yellow('No chapters selected.'));
            return;
        }

        const saveDir = join(PATHS.DATA_DIR, formatFilename(details.title) || 'manga');
        await downloadWithSpinner(
            new MangaDownloader(details, saveDir, this.network),
            details.chapters.filter((_, index) => selected.includes(index))
        );
    }

    private async handleCatalog(): Promise<void> {
        const walker = new CatalogWalker(this.network);
        const links = await walkWithSpinner(walker);
        for (const link of links) {
            console.log(link);
        }
    }
}

/**
 * Downloads chapters with a progress spinner and prints a summary
 */
export async function downloadWithSpinner(
    downloader: MangaDownloader,
    chapters?: Parameters<MangaDownloader['downloadChapters']>[0]
): Promise<void> {
    const metaSpinner = ora('Creating metadata...').start();
    try {
        await downloader.createMetadataFile();
        metaSpinner.succeed('Metadata created');
    } catch (error) {
        metaSpinner.fail(chalk.red('Failed to create metadata'));
        throw error;
    }

    const spinner = ora('Downloading...').start();
    let summary: DownloadSummary;
    try {
        summary = await downloader.downloadChapters(chapters, (current, total) => {
            spinner.text = `Downloading chapters: ${current}/${total}`;
        });
    } catch (error) {
        spinner.fail(chalk.red('Download failed'));
        throw error;
    }

    if (summary.failed.length > 0) {
        spinner.warn(chalk.yellow(`Downloaded ${summary.downloaded}, skipped ${summary.skipped}, failed ${summary.failed.length}`));
        for (const failure of summary.failed) {
            console.log(chalk.red(`  ✗ ${failure.url}: ${failure.error}`));
        }
    } else {
        spinner.succeed(chalk.green(`Downloaded ${summary.downloaded}, skipped ${summary.skipped}`));
    }
    console.log(chalk.green(`\n✅ Data saved to: ${downloader.getBaseFolder()}`));
}

/**
 * Walks the catalog with a progress spinner
 *
 * @param pages - Pages to fetch, all pages by default
 */
export async function walkWithSpinner(walker: CatalogWalker, pages?: number): Promise<Set<string>> {
    const spinner = ora('Reading catalog size...').start();
    let total: number;
    try {
        total = pages ?? await walker.getTotalPages();
    } catch (error) {
        spinner.fail(chalk.red('Failed to read catalog size'));
        throw error;
    }

    spinner.text = `Fetching catalog pages: 0/${total}`;
    const links = await walker.start(total, (current) => {
        spinner.text = `Fetching catalog pages: ${current}/${total}`;
    });

    const failed = walker.getFailures().length;
    if (failed > 0) {
        spinner.warn(chalk.yellow(`Found ${links.size} manga; ${failed} of ${total} pages failed`));
    } else {
        spinner.succeed(chalk.green(`Found ${links.size} manga on ${total} pages`));
    }
    return links;
}

/**
 * Prints the images of a chapter
 */
export async function printChapterImages(scraper: ChapterImagesScraper): Promise<void> {
    const images = await scraper.getImages();
    console.log(chalk.cyan(`\n${images.length} images in ${scraper.url}\n`));
    for (const image of images) {
        console.log(`  ${String(image.orderNo).padStart(4)}  ${image.url}`);
    }
}
