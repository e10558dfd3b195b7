import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { PDFDocument, PDFFont, PDFImage, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import fontkit from '@pdf-lib/fontkit';
import type { AppConfig } from '../../../config/configuration';
import { errorMessage } from '../../../domain/errors/pipeline.errors';
import type {
  ReportEntry,
  ReportRendererPort,
} from '../../../application/ports/output/report-renderer.port';

// US Letter, in points
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 50;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const IMAGE_DISPLAY_WIDTH = 400;

const HEADER_SIZE = 14;
const HEADER_LINE_HEIGHT = 20;
const FONT_SIZE = 11;
const LINE_HEIGHT = 16;
const SECTION_GAP = 8;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

// Helvetica is WinAnsi-encoded; anything outside printable Latin-1 cannot be drawn
const NON_WIN_ANSI = /[^\x20-\x7E\xA0-\xFF]/g;

interface ReportFonts {
  regular: PDFFont;
  bold: PDFFont;
  winAnsiOnly: boolean;
}

/**
 * Writes lines top to bottom and starts a new page when the bottom margin is reached
 */
class PageCursor {
  private page: PDFPage | null = null;
  private y = 0;

  constructor(private readonly doc: PDFDocument) {}

  newPage(): PDFPage {
    this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
    return this.page;
  }

  get remainingHeight(): number {
    return this.y - MARGIN;
  }

  line(text: string, font: PDFFont, size: number, lineHeight: number): void {
    let page = this.page;
    if (!page || this.y - lineHeight < MARGIN) {
      page = this.newPage();
    }
    this.y -= lineHeight;
    if (text) {
      page.drawText(text, { x: MARGIN, y: this.y, size, font, color: rgb(0, 0, 0) });
    }
  }

  image(image: PDFImage, width: number, height: number): void {
    let page = this.page;
    if (!page || this.y - height < MARGIN) {
      page = this.newPage();
    }
    this.y -= height;
    page.drawImage(image, { x: MARGIN, y: this.y, width, height });
  }

  gap(height: number): void {
    this.y -= height;
  }
}

/**
 * Pdf-lib Report Renderer Adapter
 * Implements ReportRendererPort. Every entry starts on its own page.
 */
@Injectable()
export class PdfLibReportRendererAdapter implements ReportRendererPort {
  private readonly logger = new Logger(PdfLibReportRendererAdapter.name);
  private readonly fontPath?: string;
  private fontBytes?: Promise<Buffer>;

  constructor(configService: ConfigService<AppConfig>) {
    this.fontPath = configService.getOrThrow('report', { infer: true }).fontPath;
  }

  async render(entries: ReadonlyArray<ReportEntry>): Promise<Buffer> {
    const doc = await PDFDocument.create();
    doc.setTitle('OCR results');
    const fonts = await this.embedFonts(doc);
    const cursor = new PageCursor(doc);

    for (const [index, entry] of entries.entries()) {
      cursor.newPage();

      const header = [`Page ${entry.page ?? index + 1}`, entry.filename].filter(Boolean).join(' - ');
      this.writeText(cursor, header, fonts, fonts.bold, HEADER_SIZE, HEADER_LINE_HEIGHT);
      cursor.gap(SECTION_GAP);

      if (entry.image) {
        await this.drawImage(doc, cursor, entry.image, index);
      }

      this.writeText(cursor, 'Summary:', fonts, fonts.bold, FONT_SIZE, LINE_HEIGHT);
      this.writeText(cursor, entry.summary, fonts, fonts.regular, FONT_SIZE, LINE_HEIGHT);
      cursor.gap(SECTION_GAP);

      this.writeText(cursor, 'Text:', fonts, fonts.bold, FONT_SIZE, LINE_HEIGHT);
      this.writeText(cursor, entry.text, fonts, fonts.regular, FONT_SIZE, LINE_HEIGHT);
    }

    const bytes = await doc.save();
    return Buffer.from(bytes);
  }

  private async embedFonts(doc: PDFDocument): Promise<ReportFonts> {
    if (this.fontPath) {
      doc.registerFontkit(fontkit);
      this.fontBytes ??= readFile(this.fontPath);
      const font = await doc.embedFont(await this.fontBytes, { subset: true });
      return { regular: font, bold: font, winAnsiOnly: false };
    }

    return {
      regular: await doc.embedFont(StandardFonts.Helvetica),
      bold: await doc.embedFont(StandardFonts.HelveticaBold),
      winAnsiOnly: true,
    };
  }

  private async drawImage(
    doc: PDFDocument,
    cursor: PageCursor,
    data: Buffer,
    index: number,
  ): Promise<void> {
    let image: PDFImage;
    try {
      if (hasSignature(data, PNG_SIGNATURE)) {
        image = await doc.embedPng(data);
      } else if (hasSignature(data, JPEG_SIGNATURE)) {
        image = await doc.embedJpg(data);
      } else {
        this.logger.warn(`Skipping image of entry ${index}: not a PNG or JPEG`);
        return;
      }
    } catch (error) {
      this.logger.warn(`Skipping image of entry ${index}: ${errorMessage(error)}`);
      return;
    }

    let width = IMAGE_DISPLAY_WIDTH;
    let height = (image.height / image.width) * width;
    const available = cursor.remainingHeight - SECTION_GAP;
    if (height > available) {
      width = (width * available) / height;
      height = available;
    }

    cursor.image(image, width, height);
    cursor.gap(SECTION_GAP);
  }

  private writeText(
    cursor: PageCursor,
    text: string,
    fonts: ReportFonts,
    font: PDFFont,
    size: number,
    lineHeight: number,
  ): void {
    const clean = this.sanitize(text, fonts.winAnsiOnly);
    for (const line of wrapText(clean, font, size, CONTENT_WIDTH)) {
      cursor.line(line, font, size, lineHeight);
    }
  }

  private sanitize(text: string, winAnsiOnly: boolean): string {
    const normalized = text.replace(/\r/g, '').replace(/\t/g, '    ');
    if (!winAnsiOnly) {
      return normalized;
    }
    return normalized
      .split('\n')
      .map((line) => line.replace(NON_WIN_ANSI, '?'))
      .join('\n');
  }
}

function hasSignature(data: Buffer, signature: number[]): boolean {
  return data.length >= signature.length && signature.every((byte, i) => data[i] === byte);
}

/**
 * Greedy word wrap. Words wider than the line are split by character.
 */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const fits = (value: string) => font.widthOfTextAtSize(value, size) <= maxWidth;
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    let current = '';

    for (const word of paragraph.split(' ')) {
      const candidate = current ? `${current} ${word}` : word;
      if (fits(candidate)) {
        current = candidate;
        continue;
      }

      if (current) {
        lines.push(current);
        current = '';
      }

      if (fits(word)) {
        current = word;
        continue;
      }

      for (const char of word) {
        if (current && !fits(current + char)) {
          lines.push(current);
          current = '';
        }
        current += char;
      }
    }

    lines.push(current);
  }

  return lines;
}
