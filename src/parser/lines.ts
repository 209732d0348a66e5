/**
 * Line Tokenizer
 * Splits lsusb text into indented lines and walks them with a cursor
 */

export interface Line {
  number: number; // 1-based physical line number
  indent: number;
  content: string;
}

/**
 * Tokenize text into non-blank lines. Indent counts every leading
 * whitespace character, tabs included.
 */
export function tokenize(text: string): Line[] {
  const lines: Line[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    const content = raw.trim();
    if (!content) return;
    lines.push({
      number: index + 1,
      indent: raw.length - raw.trimStart().length,
      content,
    });
  });
  return lines;
}

export class LineCursor {
  private readonly lines: readonly Line[];
  private position = 0;

  constructor(lines: readonly Line[]) {
    this.lines = lines;
  }

  get current(): Line | undefined {
    return this.lines[this.position];
  }

  get atEnd(): boolean {
    return this.position >= this.lines.length;
  }

  advance(): Line | undefined {
    if (!this.atEnd) this.position++;
    return this.current;
  }

  peek(offset = 1): Line | undefined {
    const index = this.position + offset;
    return index >= 0 ? this.lines[index] : undefined;
  }

  /**
   * Lines after the current one with indent greater than headerIndent.
   * Does not move the cursor.
   */
  body(headerIndent: number): Line[] {
    const result: Line[] = [];
    for (let i = this.position + 1; i < this.lines.length; i++) {
      if (this.lines[i].indent <= headerIndent) break;
      result.push(this.lines[i]);
    }
    return result;
  }

  /**
   * Consume the current header line and its whole body
   */
  skipBody(headerIndent: number): void {
    this.advance();
    while (this.current && this.current.indent > headerIndent) {
      this.advance();
    }
  }
}
