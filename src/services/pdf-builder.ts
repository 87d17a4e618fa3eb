/**
 * PDF Builder Service
 * Assembles an ordered list of local images into one PDF, one page per image
 */

import { readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PDFDocument, type PDFImage } from 'pdf-lib';
import sharp from 'sharp';

import { ensureDir, removeFile } from '../utils/fs';
import { logger } from '../utils/logger';

/**
 * Raised when the images cannot be assembled or the output cannot be written
 */
export class AssemblyError extends Error {
    constructor(
        message: string,
        public readonly outputPath?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AssemblyError';
    }
}

/**
 * Turns ordered local image files into a single document
 */
export interface DocumentAssembler {
    assemble(imagePaths: readonly string[], outputPath: string): Promise<void>;
}

/**
 * Image bytes in a format pdf-lib can embed
 */
interface EmbeddableImage {
    data: Buffer;
    format: 'jpg' | 'png';
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * PdfBuilder writes each image on its own page sized to the image.
 * JPEG and PNG are embedded as-is; anything else sharp can read
 * (WebP, GIF, AVIF, TIFF) is converted to PNG first.
 */
export class PdfBuilder implements DocumentAssembler {
    /**
     * Reads an image and brings it into an embeddable format
     */
    async prepareImage(imagePath: string): Promise<EmbeddableImage> {
        const data = await readFile(imagePath);
        const { format } = await sharp(data).metadata();

        if (format === 'jpeg') {
            return { data, format: 'jpg' };
        }
        if (format === 'png') {
            return { data, format: 'png' };
        }

        logger.debug(`Converting ${format ?? 'unknown'} image ${imagePath} to PNG`);
        return { data: await sharp(data).png().toBuffer(), format: 'png' };
    }

    private async embed(doc: PDFDocument, imagePath: string, outputPath: string): Promise<PDFImage> {
        try {
            const image = await this.prepareImage(imagePath);
            return image.format === 'jpg'
                ? await doc.embedJpg(image.data)
                : await doc.embedPng(image.data);
        } catch (error) {
            throw new AssemblyError(
                `Cannot use image ${imagePath}: ${describe(error)}`,
                outputPath,
                { cause: error }
            );
        }
    }

    /**
     * Builds the PDF in memory and writes it in one go.
     *
     * @throws AssemblyError for an empty list, an unreadable image or an unwritable output path
     */
    async assemble(imagePaths: readonly string[], outputPath: string): Promise<void> {
        if (imagePaths.length === 0) {
            throw new AssemblyError('Cannot build a PDF without images', outputPath);
        }

        const doc = await PDFDocument.create();
        for (const imagePath of imagePaths) {
            const image = await this.embed(doc, imagePath, outputPath);
            const page = doc.addPage([image.width, image.height]);
            page.drawImage(image, { x: 0, y: 0, width: image.width, height: image.height });
        }
        const bytes = await doc.save();

        try {
            await ensureDir(dirname(outputPath));
            await writeFile(outputPath, bytes);
        } catch (error) {
            await removeFile(outputPath);
            throw new AssemblyError(
                `Cannot write ${outputPath}: ${describe(error)}`,
                outputPath,
                { cause: error }
            );
        }

        logger.debug(`Wrote ${imagePaths.length} pages to ${outputPath}`);
    }
}
