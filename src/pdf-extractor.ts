/**
 * PDF page-text extraction and caching module.
 *
 * Byte-level PDF decoding is delegated to `pdf-parse`; this module only turns
 * its output into page-tagged text and keeps a single JSON cache file so a
 * policy is parsed once. Cache structure:
 *   {
 *     "version": 2,
 *     "entries": {
 *       "/absolute/path/to/policy.pdf": {
 *         "pdfPath": "relative/path/to/policy.pdf",
 *         "pdfSize": 12345,
 *         "extractedAt": "2024-01-01T00:00:00Z",
 *         "pages": [{ "pageNumber": 1, "text": "..." }]
 *       }
 *     }
 *   }
 *
 * An entry is stale when the PDF's size changed. A corrupt or missing cache
 * file is replaced.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import type { PageText } from "./types";

export interface PdfCacheEntry {
  pdfPath: string;
  pdfSize: number;
  extractedAt: string;
  pages: PageText[];
}

interface PdfCacheStore {
  version: number;
  entries: Record<string, PdfCacheEntry>;
}

const CACHE_VERSION = 2;

function emptyStore(): PdfCacheStore {
  return { version: CACHE_VERSION, entries: {} };
}

function isCacheStore(v: unknown): v is PdfCacheStore {
  if (typeof v !== "object" || v === null || !("version" in v) || !("entries" in v)) return false;
  return v.version === CACHE_VERSION && typeof v.entries === "object" && v.entries !== null;
}

/**
 * PDF text extraction utility with automatic caching.
 */
export class PdfExtractor {
  private readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param cacheDir Directory for `pdf-text-cache.json`.
   * @param verbose  Enable additional logging.
   */
  constructor(cacheDir: string, verbose = false) {
    this.cacheFilePath = path.join(cacheDir, "pdf-text-cache.json");
    this.verbose = verbose;
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.cacheFilePath, "utf8"));
      this.cacheStore = isCacheStore(parsed) ? parsed : emptyStore();
    } catch {
      // missing or unreadable cache: start fresh
      this.cacheStore = emptyStore();
    }
    return this.cacheStore;
  }

  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store, null, 2), "utf8");
    } catch (e) {
      console.error(`[PDF] Failed to save cache store:`, e);
    }
  }

  private async getCached(pdfAbsPath: string, pdfSize: number): Promise<PdfCacheEntry | null> {
    const store = await this.loadCacheStore();
    const entry = store.entries[pdfAbsPath];
    if (entry && entry.pdfSize === pdfSize && Array.isArray(entry.pages)) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return entry;
    }
    if (this.verbose) console.error(`[PDF] Cache miss for ${path.basename(pdfAbsPath)}`);
    return null;
  }

  /**
   * Page-tagged text of a PDF, from the cache when it is fresh. Extraction
   * failures are logged and yield no pages, which the pipeline reports as
   * "no extractable text".
   *
   * @param pdfAbsPath Absolute path to the PDF file
   * @param pdfRelPath Relative path (for cache metadata)
   * @param pdfSize File size in bytes
   */
  public async extractPages(
    pdfAbsPath: string,
    pdfRelPath: string,
    pdfSize: number,
  ): Promise<PageText[]> {
    const cached = await this.getCached(pdfAbsPath, pdfSize);
    if (cached) return cached.pages;

    if (this.verbose) console.error(`[PDF] Extracting text from ${path.basename(pdfAbsPath)}...`);
    let pages: PageText[];
    try {
      const parser = new PDFParse({ data: await fs.readFile(pdfAbsPath) });
      try {
        const result = await parser.getText();
        pages = result.pages.map((p) => ({ pageNumber: p.num, text: p.text }));
      } finally {
        await parser.destroy();
      }
    } catch (e) {
      console.error(`[PDF] Failed to extract text from ${path.basename(pdfAbsPath)}:`, e);
      return [];
    }

    const store = await this.loadCacheStore();
    store.entries[pdfAbsPath] = {
      pdfPath: pdfRelPath,
      pdfSize,
      extractedAt: new Date().toISOString(),
      pages,
    };
    await this.saveCacheStore(store);
    return pages;
  }

  /** True if the path has a .pdf extension (case-insensitive). */
  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
