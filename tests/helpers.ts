/**
 * Shared test fixtures
 */

import { readFileSync } from "fs";

export type FixtureName = "uac1-headset.txt" | "uac2-interface.txt" | "multi-config.txt";

export function fixture(name: FixtureName): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}
