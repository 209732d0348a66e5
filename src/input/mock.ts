/**
 * Mock Source for Testing
 * Can replace any real source in tests
 */

import type { DescriptorSource, SourceResult } from "./interface";

export class MockSource implements DescriptorSource {
  readonly origin = "mock";
  public readCalls = 0;

  constructor(private result: SourceResult) {}

  static text(text: string): MockSource {
    return new MockSource({ ok: true, text });
  }

  static failing(error: string): MockSource {
    return new MockSource({ ok: false, error });
  }

  async read(): Promise<SourceResult> {
    this.readCalls++;
    return { origin: this.origin, ...this.result };
  }

  // Helper to update mock state during test
  setResult(result: SourceResult): void {
    this.result = result;
  }
}
