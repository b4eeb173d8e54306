import { DecodeError } from "../router/errors.ts";

export type AddressFamily = "ipv4" | "ipv6";

export const ADDRESS_BITS: Record<AddressFamily, number> = {
  ipv4: 32,
  ipv6: 128,
};

export interface Prefix {
  family: AddressFamily;
  address: Uint8Array;
  length: number;
}

/**
 * Expands the BIT STRING form of an address prefix (RFC 3779 §2.1.1) to a full
 * address. Bits past the prefix length are masked off; strict mode rejects them.
 */
export function prefixFromBitString(
  family: AddressFamily,
  bits: Uint8Array,
  unusedBits: number,
  strict: boolean,
): Prefix {
  if (unusedBits < 0 || unusedBits > 7 || (bits.length === 0 && unusedBits !== 0)) {
    throw new DecodeError(`Invalid unused-bit count ${unusedBits} in ${family} prefix`);
  }

  const length = bits.length * 8 - unusedBits;
  const maxBits = ADDRESS_BITS[family];
  if (length > maxBits) {
    throw new DecodeError(`${family} prefix length ${length} exceeds ${maxBits} bits`);
  }

  const address = new Uint8Array(maxBits / 8);
  address.set(bits);

  if (unusedBits > 0) {
    const last = bits.length - 1;
    const original = address[last] ?? 0;
    const masked = original & ((0xff << unusedBits) & 0xff);
    if (strict && masked !== original) {
      throw new DecodeError(`${family} prefix has bits set past its length ${length}`);
    }
    address[last] = masked;
  }

  return { family, address, length };
}

export function formatPrefix(prefix: Prefix): string {
  const address =
    prefix.family === "ipv4" ? formatIPv4(prefix.address) : formatIPv6(prefix.address);
  return `${address}/${prefix.length}`;
}

function formatIPv4(address: Uint8Array): string {
  return Array.from(address).join(".");
}

/**
 * RFC 5952 text form: lower-case hex, no leading zeros, the longest run of two
 * or more zero groups (the first one on a tie) replaced by "::".
 */
function formatIPv6(address: Uint8Array): string {
  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(((address[i] ?? 0) << 8) | (address[i + 1] ?? 0));
  }

  let bestStart = -1;
  let bestLength = 0;
  let index = 0;
  while (index < groups.length) {
    if (groups[index] !== 0) {
      index += 1;
      continue;
    }
    let end = index;
    while (end < groups.length && groups[end] === 0) {
      end += 1;
    }
    if (end - index > bestLength) {
      bestStart = index;
      bestLength = end - index;
    }
    index = end;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) {
    return hex.join(":");
  }

  const head = hex.slice(0, bestStart).join(":");
  const tail = hex.slice(bestStart + bestLength).join(":");
  return `${head}::${tail}`;
}
