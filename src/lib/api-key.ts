import { randomBytes } from "crypto";

const PREFIX = "cm_";
const ALPHABET = "abcdefghijklmnopqrstuvwxyz234567";
const KEY_BYTES = 32;
const ENCODED_LENGTH = Math.ceil((KEY_BYTES * 8) / 5); // 52

/** RFC 4648 base32 without padding, lowercase. */
export function base32(bytes: Uint8Array): string {
  let out = "";
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      out += ALPHABET[(buffer >>> (bits - 5)) & 31];
      bits -= 5;
    }
  }
  if (bits > 0) out += ALPHABET[(buffer << (5 - bits)) & 31];
  return out;
}

/** 256 bits of entropy, e.g. `cm_` followed by 52 base32 characters. */
export function generateApiKey(random: (size: number) => Uint8Array = randomBytes): string {
  return PREFIX + base32(random(KEY_BYTES));
}

export function isApiKeyFormat(key: string): boolean {
  if (!key.startsWith(PREFIX)) return false;
  const body = key.slice(PREFIX.length);
  return body.length === ENCODED_LENGTH && [...body].every((c) => ALPHABET.includes(c));
}

export function maskApiKey(key: string): string {
  if (key.length <= 12) return "****";
  return `${key.slice(0, 7)}…${key.slice(-4)}`;
}
