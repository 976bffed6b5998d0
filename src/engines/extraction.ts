/**
 * Extractor Gateway
 *
 * "Get text from a file" for every supported content category:
 * - text: UTF-8 with a declared fallback encoding, binary content rejected
 * - pdf: ordered backends, each tried in turn until one yields text
 *
 * Also decides which category (if any) a path belongs to.
 */

import * as fs from 'node:fs';
import isBinaryPath from 'is-binary-path';
import { PDFParse } from 'pdf-parse';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, toError } from '../errors/index.js';
import { getLogger } from '../utils/logger.js';
import { getExtension } from '../utils/paths.js';

// ============================================================================
// Types
// ============================================================================

export type ContentCategory = 'text' | 'pdf';

export type FallbackEncoding = 'latin1' | 'utf16le' | 'ascii';

/**
 * A PDF text extraction backend
 */
export interface PdfBackend {
  readonly name: string;
  extract(data: Uint8Array): Promise<string>;
}

export interface ExtractorOptions {
  maxFileSizeBytes: number;
  fallbackEncoding: FallbackEncoding;
  textExtensions: readonly string[];
  includeUnknownExtensions?: boolean;
  /** Tried in order (defaults to pdf-parse, then pdfjs-dist) */
  pdfBackends?: PdfBackend[];
}

/** Bytes inspected for NUL when deciding that a "text" file is binary */
const BINARY_SNIFF_BYTES = 8 * 1024;

// ============================================================================
// PDF Backends
// ============================================================================

export const pdfParseBackend: PdfBackend = {
  name: 'pdf-parse',
  async extract(data: Uint8Array): Promise<string> {
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return result.text;
    } finally {
      await parser.destroy();
    }
  },
};

export const pdfjsBackend: PdfBackend = {
  name: 'pdfjs-dist',
  async extract(data: Uint8Array): Promise<string> {
    const document = await getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;
    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const content = await page.getTextContent();
        const parts: string[] = [];
        for (const item of content.items) {
          if ('str' in item) {
            parts.push(item.str);
          }
        }
        pages.push(parts.join(' '));
        page.cleanup();
      }
      return pages.join('\n');
    } finally {
      await document.destroy();
    }
  },
};

export const DEFAULT_PDF_BACKENDS: readonly PdfBackend[] = [pdfParseBackend, pdfjsBackend];

// ============================================================================
// Extractor Gateway
// ============================================================================

export class ExtractorGateway {
  private readonly options: ExtractorOptions;
  private readonly pdfBackends: readonly PdfBackend[];
  private readonly textExtensions: Set<string>;

  constructor(options: ExtractorOptions) {
    this.options = options;
    this.pdfBackends = options.pdfBackends ?? DEFAULT_PDF_BACKENDS;
    this.textExtensions = new Set(options.textExtensions.map((ext) => ext.toLowerCase()));
  }

  /**
   * Category of a path, or null if it is not one of the accepted categories
   */
  classify(filePath: string, accepted: readonly ContentCategory[]): ContentCategory | null {
    const ext = getExtension(filePath);

    if (ext === '.pdf') {
      return accepted.includes('pdf') ? 'pdf' : null;
    }
    if (!accepted.includes('text')) {
      return null;
    }
    if (this.textExtensions.has(ext)) {
      return 'text';
    }
    if (this.options.includeUnknownExtensions && !isBinaryPath(filePath)) {
      return 'text';
    }
    return null;
  }

  /**
   * Extract the text of a file
   *
   * @throws ExtractionError if the file is too large, unreadable, binary,
   *         or no PDF backend produced text
   */
  async extract(filePath: string, category: ContentCategory): Promise<string> {
    const data = await this.readBytes(filePath);
    return category === 'pdf' ? this.extractPdf(filePath, data) : this.decodeText(filePath, data);
  }

  private async readBytes(filePath: string): Promise<Buffer> {
    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.size > this.options.maxFileSizeBytes) {
        throw new ExtractionError(
          filePath,
          `file size ${stats.size} exceeds limit of ${this.options.maxFileSizeBytes} bytes`
        );
      }
      return await fs.promises.readFile(filePath);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      const cause = toError(error);
      throw new ExtractionError(filePath, `cannot read file: ${cause.message}`, cause);
    }
  }

  private decodeText(filePath: string, data: Buffer): string {
    if (data.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
      throw new ExtractionError(filePath, 'file contains binary data');
    }

    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(data);
    } catch {
      getLogger().debug('Extractor', `Not valid UTF-8, decoding as ${this.options.fallbackEncoding}`, {
        path: filePath,
      });
      return data.toString(this.options.fallbackEncoding);
    }
  }

  private async extractPdf(filePath: string, data: Buffer): Promise<string> {
    const logger = getLogger();
    const failures: string[] = [];

    for (const backend of this.pdfBackends) {
      try {
        // Backends may transfer the buffer to a worker; each gets its own copy
        const text = await backend.extract(new Uint8Array(data));
        if (text.trim() !== '') {
          return text;
        }
        failures.push(`${backend.name}: no text`);
        logger.debug('Extractor', `${backend.name} returned no text`, { path: filePath });
      } catch (error) {
        const message = toError(error).message;
        failures.push(`${backend.name}: ${message}`);
        logger.debug('Extractor', `${backend.name} failed`, { path: filePath, error: message });
      }
    }

    throw new ExtractionError(filePath, `all PDF backends failed (${failures.join('; ')})`);
  }
}
