import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { PageText } from "./types";
import { PdfExtractor } from "./pdf-extractor";
import { InvalidArgumentError } from "./errors";

export interface PolicyFile {
  /** Path relative to the library root, forward slashes. */
  rel: string;
  abs: string;
  size: number;
}

export interface PolicyLibraryOptions {
  root: string; // directory holding policy documents
  allowedExt: string[]; // extensions WITHOUT leading dot
  excludedFolders?: string[]; // folder names pruned during discovery
  pdfExtractor: PdfExtractor;
  verbose?: boolean;
}

/**
 * Split a plain-text export into pages on form feeds. Text without form
 * feeds is one page.
 */
export function splitTextPages(content: string): PageText[] {
  return content.split("\f").map((text, i) => ({ pageNumber: i + 1, text }));
}

/**
 * Policy documents available under a root folder: discovery via fast-glob and
 * page extraction for PDF and plain-text files.
 */
export class PolicyLibrary {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly pdfExtractor: PdfExtractor;
  private readonly verbose: boolean;

  public constructor(opts: PolicyLibraryOptions) {
    this.root = path.resolve(opts.root);
    this.allowedExt = opts.allowedExt.map((e) => e.toLowerCase().replace(/^\./, ""));
    this.excludedFolders = opts.excludedFolders ?? [];
    this.pdfExtractor = opts.pdfExtractor;
    this.verbose = !!opts.verbose;
  }

  public getRoot(): string {
    return this.root;
  }

  /** Every allowed file under the root, sorted by relative path. */
  public async discover(): Promise<PolicyFile[]> {
    if (!this.allowedExt.length) return [];
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
      stats: true,
    });
    const out = files.map((f) => ({
      rel: f.path,
      abs: path.join(this.root, f.path),
      size: f.stats?.size ?? 0,
    }));
    out.sort((a, b) => a.rel.localeCompare(b.rel));
    if (this.verbose) console.error(`[Policy][verbose] Discovered ${out.length} policy files`);
    return out;
  }

  /**
   * Resolve a user-supplied relative path, refusing anything that escapes
   * the root.
   */
  public ensureWithinRoot(relPath: string): string {
    const abs = path.resolve(this.root, relPath);
    const rel = path.relative(this.root, abs);
    if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new InvalidArgumentError("Path outside POLICY_ROOT");
    }
    return abs;
  }

  /** Page-tagged text of one policy file. */
  public async loadPages(relPath: string): Promise<PageText[]> {
    const abs = this.ensureWithinRoot(relPath);
    const ext = path.extname(abs).toLowerCase().replace(/^\./, "");
    if (!this.allowedExt.includes(ext)) {
      throw new InvalidArgumentError(`Unsupported policy file type: .${ext}`);
    }
    let size: number;
    try {
      const st = await fs.stat(abs);
      if (!st.isFile()) throw new InvalidArgumentError(`Not a file: ${relPath}`);
      size = st.size;
    } catch (e) {
      if (e instanceof InvalidArgumentError) throw e;
      throw new InvalidArgumentError(`Policy file not found: ${relPath}`);
    }
    if (PdfExtractor.isPdf(abs)) {
      return this.pdfExtractor.extractPages(abs, path.relative(this.root, abs), size);
    }
    return splitTextPages(await fs.readFile(abs, "utf8"));
  }
}
