/** A cell as a decoder hands it over, before table cleaning. */
export type RawCell = string | number | boolean | Date | null;

export type RawGrid = RawCell[][];

/**
 * One way of decoding a spreadsheet file. Returns null when the content is
 * not in a format this strategy understands.
 */
export interface ParseStrategy {
  name: string;
  decode(content: Uint8Array): Promise<RawGrid | null>;
}

export interface TableOptions {
  /** Zero-based line holding the column names; -1 when the file has none. */
  headerRow: number;
  /** Rows blank in this zero-based column are dropped; -1 disables. */
  requiredColumnIndex: number;
}
