import { crc64Iso } from "./crc64.js";

export type StringHash = (value: string) => bigint;

export interface StringPoolOptions {
  hash?: StringHash;
}

const UNSAFE_LITERAL_CHARS = /[`%$]/;

/**
 * Content-addressed table of the string constants baked into a program.
 *
 * Lookup goes through a 64-bit hash, but a hit is confirmed against the stored
 * text: two different strings sharing a hash get separate indexes.
 */
export class StringPool {
  private readonly hash: StringHash;
  private readonly values: string[] = [];
  private readonly byHash = new Map<bigint, number[]>();

  constructor(options: StringPoolOptions = {}) {
    this.hash = options.hash ?? crc64Iso;
  }

  get size(): number {
    return this.values.length;
  }

  intern(value: string): string {
    const key = this.hash(value);
    const bucket = this.byHash.get(key);
    if (bucket) {
      const existing = bucket.find((index) => this.values[index] === value);
      if (existing !== undefined) {
        return constantRef(existing);
      }
    }
    const index = this.values.length;
    this.values.push(value);
    if (bucket) {
      bucket.push(index);
    } else {
      this.byHash.set(key, [index]);
    }
    return constantRef(index);
  }

  strings(): readonly string[] {
    return this.values;
  }
}

export const constantRef = (index: number): string => `STR${index}`;

export const toLiteral = (value: string): string => {
  if (!UNSAFE_LITERAL_CHARS.test(value)) {
    return `\`${value}\``;
  }
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
};
