/**
 * Tests for PdfBuilder
 */

import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';

import { AssemblyError, PdfBuilder } from '../../src/services/pdf-builder';

function solid(width: number, height: number) {
    return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } });
}

describe('PdfBuilder', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'pdf-test-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('writes one page per image, sized to the image, in order', async () => {
        const jpg = join(dir, '0001.jpg');
        const png = join(dir, '0002.png');
        const webp = join(dir, '0003.webp');
        await writeFile(jpg, await solid(20, 30).jpeg().toBuffer());
        await writeFile(png, await solid(40, 10).png().toBuffer());
        await writeFile(webp, await solid(8, 8).webp().toBuffer());
        const outputPath = join(dir, 'out', 'chapter.pdf');

        await new PdfBuilder().assemble([jpg, png, webp], outputPath);

        const doc = await PDFDocument.load(await readFile(outputPath));
        expect(doc.getPages().map((page) => page.getSize())).toEqual([
            { width: 20, height: 30 },
            { width: 40, height: 10 },
            { width: 8, height: 8 },
        ]);
    });

    it('refuses an empty image list', async () => {
        const outputPath = join(dir, 'empty.pdf');

        await expect(new PdfBuilder().assemble([], outputPath)).rejects.toThrow('Cannot build a PDF without images');
        expect(existsSync(outputPath)).toBe(false);
    });

    it('fails on an unreadable image without writing output', async () => {
        const outputPath = join(dir, 'broken.pdf');
        const missing = join(dir, 'missing.jpg');

        const error = await new PdfBuilder().assemble([missing], outputPath).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(AssemblyError);
        expect(error).toMatchObject({ outputPath });
        expect(existsSync(outputPath)).toBe(false);
    });

    it('fails on a file that is not an image', async () => {
        const text = join(dir, '0001.jpg');
        await writeFile(text, 'not an image');

        await expect(new PdfBuilder().assemble([text], join(dir, 'x.pdf'))).rejects.toThrow(AssemblyError);
    });

    it('fails when the output path cannot be written', async () => {
        const jpg = join(dir, '0001.jpg');
        await writeFile(jpg, await solid(4, 4).jpeg().toBuffer());

        await expect(new PdfBuilder().assemble([jpg], dir)).rejects.toThrow(`Cannot write ${dir}`);
        expect(existsSync(jpg)).toBe(true);
    });
});
