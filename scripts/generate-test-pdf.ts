import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import { mkdir, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

const SAMPLES: Record<string, { pages: number; size: [number, number] }> = {
  'one-page': { pages: 1, size: [595, 842] },
  'three-pages': { pages: 3, size: [595, 842] },
  'twelve-pages-letter': { pages: 12, size: [612, 792] },
};

async function generatePdf(name: string, pageCount: number, size: [number, number]): Promise<void> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.HelveticaBold);
  const [width, height] = size;

  for (let n = 1; n <= pageCount; n++) {
    const page = doc.addPage(size);
    // Large page numbers make ordering mistakes obvious in the output images.
    page.drawText(String(n), { x: width / 2 - 40, y: height / 2, font, size: 120 });
    page.drawRectangle({
      x: 40,
      y: 40,
      width: width - 80,
      height: height - 80,
      borderColor: rgb(0.2, 0.2, 0.2),
      borderWidth: 2,
    });
    page.drawText(`${name} - page ${n} of ${pageCount}`, { x: 50, y: 60, font, size: 12 });
  }

  const pdfBytes = await doc.save();
  const outPath = resolve('samples', `${name}.pdf`);
  await writeFile(outPath, pdfBytes);
  console.log(`Created: ${outPath}`);
}

async function main(): Promise<void> {
  await mkdir(resolve('samples'), { recursive: true });
  for (const [name, { pages, size }] of Object.entries(SAMPLES)) {
    await generatePdf(name, pages, size);
  }
}

main().catch(console.error);
