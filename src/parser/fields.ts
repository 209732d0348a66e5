/**
 * Field Tables
 * Prefix-matched decoding of "name  value" lines into descriptor records
 */

import type { Line } from "./lines";

// Value decoders

/**
 * Leading digits of the first value token ("100mA" reads 100)
 */
export function decodeInt(value: string): number {
  const match = /^(\d+)/.exec(firstToken(value));
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * A literal 0x number anywhere in the value, else the first token
 * when it is made of hex digits only
 */
export function decodeHex(value: string): number {
  const literal = /0x([0-9a-f]+)/i.exec(value);
  if (literal) return parseInt(literal[1], 16);

  const token = firstToken(value);
  return /^[0-9a-f]+$/i.test(token) ? parseInt(token, 16) : 0;
}

/**
 * Hex when the value carries a 0x literal, decimal otherwise
 * (lsusb releases differ in how they print lengths)
 */
export function decodeAuto(value: string): number {
  return /0x[0-9a-f]/i.test(value) ? decodeHex(value) : decodeInt(value);
}

/**
 * "major.minor" as (major << 8) | minor, so "2.00" reads 0x0200
 */
export function decodeBcd(value: string): number {
  const match = /(\d+)\.(\d+)/.exec(value);
  if (!match) return 0;
  return (parseInt(match[1], 10) << 8) | parseInt(match[2], 10);
}

/**
 * Label of a string-index triple: "2 Line Out" reads "Line Out"
 */
export function decodeString(value: string): string {
  const match = /^\d+\s+(.+)$/.exec(value.trim());
  return match ? match[1].trim() : "";
}

/**
 * Everything after the first token: "0x1234 Acme Corp" reads "Acme Corp"
 */
export function trailingLabel(value: string): string {
  const match = /^\S+\s+(.+)$/.exec(value.trim());
  return match ? match[1].trim() : "";
}

export function firstToken(value: string): string {
  return value.trim().split(/\s+/)[0] ?? "";
}

// Field rules

interface NumericRule<T> {
  decode: "int" | "hex" | "auto" | "bcd";
  set: (target: T, value: number, raw: string) => void;
}

interface TextRule<T> {
  decode: "string" | "word";
  set: (target: T, value: string) => void;
}

export type FieldRule<T> = (NumericRule<T> | TextRule<T>) & {
  prefix: string;
  // Value follows a "( n)" or "[ n]" index
  indexed?: boolean;
};

export interface FieldTable<T> {
  readonly rules: readonly FieldRule<T>[];
}

/**
 * Sort rules longest prefix first so "bSubslotSize" never loses
 * to a shorter rule sharing its start
 */
export function defineFields<T>(rules: FieldRule<T>[]): FieldTable<T> {
  return { rules: [...rules].sort((a, b) => b.prefix.length - a.prefix.length) };
}

function matchRule<T>(table: FieldTable<T>, content: string): FieldRule<T> | undefined {
  const lower = content.toLowerCase();
  return table.rules.find((rule) => {
    if (!lower.startsWith(rule.prefix.toLowerCase())) return false;
    const next = content.charAt(rule.prefix.length);
    return next === "" || !/[A-Za-z0-9_]/.test(next);
  });
}

function valueText<T>(rule: FieldRule<T>, content: string): string {
  const rest = content.slice(rule.prefix.length);
  if (!rule.indexed) return rest.trim();

  const close = rest.search(/[)\]]/);
  return close >= 0 ? rest.slice(close + 1).trim() : rest.trim();
}

/**
 * Decode one line into target. Returns false for unrecognized lines.
 */
export function applyField<T>(table: FieldTable<T>, target: T, content: string): boolean {
  const rule = matchRule(table, content);
  if (!rule) return false;

  const value = valueText(rule, content);
  switch (rule.decode) {
    case "int":
      rule.set(target, decodeInt(value), value);
      break;
    case "hex":
      rule.set(target, decodeHex(value), value);
      break;
    case "auto":
      rule.set(target, decodeAuto(value), value);
      break;
    case "bcd":
      rule.set(target, decodeBcd(value), value);
      break;
    case "string":
      rule.set(target, decodeString(value));
      break;
    case "word":
      rule.set(target, firstToken(value));
      break;
  }
  return true;
}

export function applyFields<T>(table: FieldTable<T>, target: T, lines: readonly Line[]): T {
  for (const line of lines) {
    applyField(table, target, line.content);
  }
  return target;
}
