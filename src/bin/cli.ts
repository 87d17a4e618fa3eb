#!/usr/bin/env node
/**
 * CLI Entry Point for manga-harvester
 */

import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import {
    Application,
    downloadWithSpinner,
    printChapterImages,
    printDetails,
    printSearchPage,
    walkWithSpinner,
} from '../cli/app';
import { closeNetworkManager, getNetworkManager } from '../services/network';
import { SearchScraper } from '../services/search';
import { MangaDetailsScraper } from '../services/details';
import { ChapterImagesScraper } from '../services/chapter-images';
import { CatalogWalker } from '../services/catalog';
import { MangaDownloader } from '../services/downloader';
import { PATHS } from '../config/constants';
import { formatFilename } from '../utils/text';
import { setVerbose } from '../utils/logger';

function positiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

const program = new Command();

program
    .name('manga-harvester')
    .description('Harvest manga metadata, chapter lists and chapter PDFs from the catalog site')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .hook('preAction', (command) => {
        setVerbose(Boolean(command.opts<{ verbose?: boolean }>().verbose));
    })
    .action(async () => {
        await new Application(getNetworkManager()).run();
    });

program
    .command('search')
    .description('Search the catalog')
    .argument('<query>', 'Search text')
    .option('-p, --page <n>', 'Result page', positiveInt, 1)
    .action(async (query: string, options: { page: number }) => {
        const result = await new SearchScraper(getNetworkManager()).search(query, options.page);
        printSearchPage(result);
    });

program
    .command('details')
    .description('Show metadata and chapters of a manga')
    .argument('<url>', 'Manga URL')
    .action(async (url: string) => {
        printDetails(await new MangaDetailsScraper(url, getNetworkManager()).getDetails());
    });

program
    .command('images')
    .description('List the images of a chapter')
    .argument('<chapterUrl>', 'Chapter URL')
    .action(async (chapterUrl: string) => {
        await printChapterImages(new ChapterImagesScraper(chapterUrl, getNetworkManager()));
    });

program
    .command('chapter')
    .description('Download a chapter as a single PDF')
    .argument('<chapterUrl>', 'Chapter URL')
    .option('-o, --output <file>', 'Output PDF path', 'chapter.pdf')
    .action(async (chapterUrl: string, options: { output: string }) => {
        const spinner = ora('Downloading images...').start();
        try {
            await new ChapterImagesScraper(chapterUrl, getNetworkManager()).downloadAsDocument(
                options.output,
                (current, total) => {
                    spinner.text = `Downloading images: ${current}/${total}`;
                }
            );
            spinner.succeed(chalk.green(`Created: ${options.output}`));
        } catch (error) {
            spinner.fail(chalk.red('Failed to build chapter PDF'));
            throw error;
        }
    });

program
    .command('catalog')
    .description('List every manga URL in the catalog')
    .option('--pages <n>', 'Only fetch the first n pages', positiveInt)
    .action(async (options: { pages?: number }) => {
        const links = await walkWithSpinner(new CatalogWalker(getNetworkManager()), options.pages);
        for (const link of links) {
            console.log(link);
        }
    });

program
    .command('download')
    .description('Download every chapter of a manga as PDFs')
    .argument('<url>', 'Manga URL')
    .option('-d, --dir <path>', 'Base directory', PATHS.DATA_DIR)
    .action(async (url: string, options: { dir: string }) => {
        const network = getNetworkManager();
        const details = await new MangaDetailsScraper(url, network).getDetails();
        const folder = join(options.dir, formatFilename(details.title) || 'manga');
        await downloadWithSpinner(new MangaDownloader(details, folder, network));
    });

program
    .parseAsync()
    .catch((error: unknown) => {
        console.error(chalk.red('\nError:'), error instanceof Error ? error.message : error);
        process.exitCode = 1;
    })
    .finally(() => {
        closeNetworkManager();
    });
