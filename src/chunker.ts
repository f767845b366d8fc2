import type { Chunk, Document } from "./types";

/** Options for a {@link Chunker}. */
export interface ChunkerOptions {
  /** Maximum characters per chunk (default 500). */
  chunkSize?: number;
  /** Characters of trailing context carried into the next chunk (default 100). */
  chunkOverlap?: number;
  /** Literal unit separator (default "\n"). */
  separator?: string;
  verbose?: boolean;
}

/**
 * Splits document text into overlapping chunks. Text is cut into units on the
 * separator and consecutive units are packed greedily up to `chunkSize`; the
 * tail of each chunk (at most `chunkOverlap` characters of whole units) is
 * repeated at the head of the next one.
 */
export class Chunker {
  public readonly chunkSize: number;
  public readonly chunkOverlap: number;
  public readonly separator: string;
  private readonly verbose: boolean;

  public constructor(opts: ChunkerOptions = {}) {
    this.chunkSize = opts.chunkSize ?? 500;
    this.chunkOverlap = opts.chunkOverlap ?? 100;
    this.separator = opts.separator ?? "\n";
    this.verbose = !!opts.verbose;
    // Safety: ensure overlap < size for forward progress
    if (this.chunkOverlap >= this.chunkSize) {
      const fallback = Math.max(0, Math.floor(this.chunkSize * 0.15));
      console.error(
        `[RAG] Provided chunkOverlap (=${this.chunkOverlap}) >= chunkSize (=${this.chunkSize}). Using fallback overlap ${fallback}.`,
      );
      this.chunkOverlap = fallback;
    }
  }

  /**
   * Chunk a whole document. Each chunk keeps its order and the character offset
   * it was found at, searching forward from the previous chunk's start.
   */
  public split(doc: Document): Chunk[] {
    const texts = Chunker.splitText(doc.content, this.chunkSize, this.chunkOverlap, this.separator);
    const out: Chunk[] = [];
    let searchFrom = 0;
    texts.forEach((text, position) => {
      const offset = doc.content.indexOf(text, searchFrom);
      if (offset >= 0) searchFrom = offset + 1;
      out.push({ id: `chunk-${position}`, documentPath: doc.path, position, offset, text });
    });
    if (this.verbose) console.error(`[RAG][verbose] Split ${doc.path} into ${out.length} chunks`);
    return out;
  }

  /**
   * Pure text splitter.
   *
   * @param text Full input string.
   * @param size Maximum characters per chunk; a single unit longer than this
   *             becomes its own oversized chunk.
   * @param overlap Maximum characters of whole trailing units shared with the next chunk.
   * @param separator Literal separator; the empty string splits into characters.
   * @returns Ordered, trimmed, non-empty chunk strings. Empty input gives `[]`.
   */
  public static splitText(text: string, size = 500, overlap = 100, separator = "\n"): string[] {
    const units = (separator ? text.split(separator) : Array.from(text)).filter((u) => u !== "");
    const sepLen = separator.length;
    const out: string[] = [];
    let current: string[] = [];
    let total = 0;

    const flush = () => {
      const joined = current.join(separator).trim();
      if (joined) out.push(joined);
    };

    for (const unit of units) {
      const len = unit.length;
      if (total + len + (current.length > 0 ? sepLen : 0) > size) {
        if (total > size) {
          console.error(`[RAG] Created a chunk of size ${total}, which is longer than the specified ${size}`);
        }
        if (current.length > 0) {
          flush();
          // Drop head units until the retained tail fits the overlap and leaves room for `unit`.
          while (
            total > overlap ||
            (total > 0 && total + len + (current.length > 0 ? sepLen : 0) > size)
          ) {
            const head = current.shift();
            if (head === undefined) break;
            total -= head.length + (current.length > 0 ? sepLen : 0);
          }
        }
      }
      current.push(unit);
      total += len + (current.length > 1 ? sepLen : 0);
    }
    if (current.length > 0) flush();
    return out;
  }
}
