/**
 * File and stdin sources
 */

import { readFile } from "fs/promises";
import type { DescriptorSource, SourceResult } from "./interface";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileSource implements DescriptorSource {
  readonly origin = "file";

  constructor(private readonly path: string) {}

  async read(): Promise<SourceResult> {
    try {
      const text = await readFile(this.path, "utf-8");
      return { ok: true, text, origin: this.origin };
    } catch (err) {
      return { ok: false, error: `Cannot read ${this.path}: ${errorMessage(err)}`, origin: this.origin };
    }
  }
}

export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Reads a piped stream to its end. An interactive terminal is refused
 * so the CLI never waits on a keyboard.
 */
export class StreamSource implements DescriptorSource {
  readonly origin = "stdin";

  constructor(private readonly stream: InputStream = process.stdin) {}

  async read(): Promise<SourceResult> {
    if (this.stream.isTTY) {
      return {
        ok: false,
        error: "No input: pipe lsusb -v output, pass a file, or use --device",
        origin: this.origin,
      };
    }

    try {
      // Decoded once at the end so a character split across chunks survives
      const chunks: Buffer[] = [];
      for await (const chunk of this.stream) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
      }
      return { ok: true, text: Buffer.concat(chunks).toString("utf-8"), origin: this.origin };
    } catch (err) {
      return { ok: false, error: `Cannot read stdin: ${errorMessage(err)}`, origin: this.origin };
    }
  }
}
