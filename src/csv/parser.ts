/**
 * Streaming CSV parser.
 *
 * Handles RFC 4180 quoting (embedded commas, quotes and newlines), CRLF or LF
 * line endings, and chunk boundaries that fall anywhere, including between
 * `\r` and `\n` or between the two quotes of an escaped quote.
 */

export type CsvRow = {
  /** 1-based position among data rows; the header row is not counted. */
  rowNumber: number;
  values: Record<string, string>;
};

/** Incremental tokenizer: feed text chunks, collect completed rows. */
export class CsvTokenizer {
  private field = "";
  private row: string[] = [];
  private inQuotes = false;
  private quotePending = false;
  private fieldQuoted = false;
  private skipLineFeed = false;

  push(chunk: string): string[][] {
    const rows: string[][] = [];

    for (const char of chunk) {
      if (this.inQuotes) {
        if (this.quotePending) {
          this.quotePending = false;
          if (char === '"') {
            this.field += '"';
            continue;
          }
          this.inQuotes = false;
        } else if (char === '"') {
          this.quotePending = true;
          continue;
        } else {
          this.field += char;
          continue;
        }
      }

      if (this.skipLineFeed) {
        this.skipLineFeed = false;
        if (char === "\n") continue;
      }

      switch (char) {
        case '"':
          if (this.field === "" && !this.fieldQuoted) {
            this.inQuotes = true;
            this.fieldQuoted = true;
          } else {
            this.field += char;
          }
          break;
        case ",":
          this.endField();
          break;
        case "\r":
          this.skipLineFeed = true;
          this.endRow(rows);
          break;
        case "\n":
          this.endRow(rows);
          break;
        default:
          this.field += char;
      }
    }

    return rows;
  }

  /** Emit whatever is buffered once the input is exhausted. */
  flush(): string[][] {
    const rows: string[][] = [];
    this.inQuotes = false;
    this.quotePending = false;
    if (this.field !== "" || this.fieldQuoted || this.row.length > 0) this.endRow(rows);
    return rows;
  }

  private endField(): void {
    this.row.push(this.field);
    this.field = "";
    this.fieldQuoted = false;
  }

  private endRow(rows: string[][]): void {
    const blank = this.row.length === 0 && this.field === "" && !this.fieldQuoted;
    this.endField();
    if (!blank) rows.push(this.row);
    this.row = [];
  }
}

/** Parse a complete CSV document into raw cell arrays. */
export function parseCsvText(text: string): string[][] {
  const tokenizer = new CsvTokenizer();
  return [...tokenizer.push(stripBom(text)), ...tokenizer.flush()];
}

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Decode a byte stream to text chunks. A leading UTF-8 BOM is dropped;
 * multi-byte characters split across chunks are reassembled.
 */
export async function* decodeStream(stream: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder("utf-8");
  const reader = stream.getReader();
  let first = true;
  // Cleared once the stream ends or errors; a consumer that stops early leaves it set.
  let open = true;

  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        open = false;
        throw error;
      }
      const { done, value } = chunk;
      if (done) {
        open = false;
        break;
      }
      let text = decoder.decode(value, { stream: true });
      if (first && text.length > 0) {
        text = stripBom(text);
        first = false;
      }
      if (text) yield text;
    }
    const tail = decoder.decode();
    if (tail) yield first ? stripBom(tail) : tail;
  } finally {
    if (open) await reader.cancel();
    reader.releaseLock();
  }
}

/**
 * Parse text chunks into rows keyed by the header row. Short rows are padded
 * with empty strings; cells beyond the header are dropped.
 */
export async function* parseCsvRows(
  chunks: AsyncIterable<string> | Iterable<string>,
): AsyncGenerator<CsvRow, void, undefined> {
  const tokenizer = new CsvTokenizer();
  let header: string[] | null = null;
  let rowNumber = 0;

  const toRecord = (cells: string[]): CsvRow | null => {
    if (!header) {
      header = cells.map((name) => name.trim());
      return null;
    }
    const values: Record<string, string> = {};
    header.forEach((name, index) => {
      values[name] = cells[index] ?? "";
    });
    rowNumber++;
    return { rowNumber, values };
  };

  for await (const chunk of chunks) {
    for (const cells of tokenizer.push(chunk)) {
      const row = toRecord(cells);
      if (row) yield row;
    }
  }
  for (const cells of tokenizer.flush()) {
    const row = toRecord(cells);
    if (row) yield row;
  }
}
