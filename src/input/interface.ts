/**
 * Descriptor Source Interface
 * Where the lsusb -v text comes from
 */

export type SourceOrigin = "file" | "stdin" | "lsusb" | "mock";

export interface SourceResult {
  ok: boolean;
  text?: string;
  error?: string;
  origin?: SourceOrigin;
}

export interface DescriptorSource {
  readonly origin: SourceOrigin;

  /**
   * Read the whole dump. Failures are reported in the result, never thrown.
   */
  read(): Promise<SourceResult>;
}
