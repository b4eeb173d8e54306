import { readFile } from "node:fs/promises";
import * as asn1js from "asn1js";
import {
  DecodeError,
  IoError,
  NO_STATUS,
  describeError,
  type OperationResult,
} from "../router/errors.ts";
import type { ParsedRoa } from "../types/rpki.ts";
import { ADDRESS_BITS, formatPrefix, prefixFromBitString, type AddressFamily } from "./prefix.ts";

export const OID_SIGNED_DATA = "1.2.840.113549.1.7.2";
export const OID_ROUTE_ORIGIN_AUTHZ = "1.2.840.113549.1.9.16.1.24";

const MAX_ASN = 4_294_967_295n;
const CONTEXT_SPECIFIC = 3;

export interface RoaDecodeOptions {
  /**
   * Reject encodings that are valid BER but not DER, and payloads that are
   * well formed but semantically off (maxLength out of range, repeated or
   * unordered families, missing signer infos).
   */
  strict?: boolean;
}

/**
 * Reads a ROA file and decodes it. Signatures and certificates are not
 * validated; only the structure and the attestation payload are.
 */
export async function decodeRoaFile(
  path: string,
  options: RoaDecodeOptions = {},
): Promise<OperationResult<ParsedRoa>> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    return { ok: false, error: new IoError(path, error) };
  }

  try {
    return { ok: true, value: decodeRoa(bytes, options) };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    return {
      ok: false,
      error: new DecodeError(`Malformed ROA: ${describeError(error)}`, NO_STATUS, { cause: error }),
    };
  }
}

/**
 * Decodes the bytes of a signed ROA object. Throws DecodeError.
 */
export function decodeRoa(bytes: Uint8Array, options: RoaDecodeOptions = {}): ParsedRoa {
  const strict = options.strict ?? false;

  const contentInfo = expectSequence(parseBer(bytes, "ContentInfo", strict), "ContentInfo");
  const [contentType, content] = elements(contentInfo, "ContentInfo", 2);
  const contentTypeOid = expectOid(contentType, "ContentInfo.contentType");
  if (contentTypeOid !== OID_SIGNED_DATA) {
    throw new DecodeError(`Not a CMS signed object (content type ${contentTypeOid})`);
  }

  const signedData = expectSequence(
    explicitContent(content, 0, "ContentInfo.content"),
    "SignedData",
  );
  const encapContentInfo = readSignedData(signedData, strict);

  const [eContentType, eContent] = elements(encapContentInfo, "EncapsulatedContentInfo", 2);
  const eContentTypeOid = expectOid(eContentType, "EncapsulatedContentInfo.eContentType");
  if (eContentTypeOid !== OID_ROUTE_ORIGIN_AUTHZ) {
    throw new DecodeError(`Not a route origin authorization (content type ${eContentTypeOid})`);
  }

  const payload = octets(
    explicitContent(eContent, 0, "EncapsulatedContentInfo.eContent"),
    "eContent",
    strict,
  );

  return readRouteOriginAttestation(
    expectSequence(parseBer(payload, "RouteOriginAttestation", strict), "RouteOriginAttestation"),
    strict,
  );
}

function readSignedData(signedData: asn1js.Sequence, strict: boolean): asn1js.Sequence {
  const [version, digestAlgorithms, encapContentInfo] = elements(signedData, "SignedData", 3);
  const versionNumber = expectInteger(version, "SignedData.version");
  if (!(digestAlgorithms instanceof asn1js.Set)) {
    throw new DecodeError("SignedData.digestAlgorithms: expected SET");
  }

  if (strict) {
    if (versionNumber !== 3n) {
      throw new DecodeError(`SignedData.version must be 3 (got ${versionNumber})`);
    }
    const signerInfos = children(signedData).at(-1);
    if (
      children(signedData).length < 4 ||
      !(signerInfos instanceof asn1js.Set) ||
      signerInfos.valueBlock.value.length === 0
    ) {
      throw new DecodeError("SignedData.signerInfos: expected a non-empty SET");
    }
  }

  return expectSequence(encapContentInfo, "EncapsulatedContentInfo");
}

function readRouteOriginAttestation(attestation: asn1js.Sequence, strict: boolean): ParsedRoa {
  let fields = children(attestation);

  const first = fields[0];
  if (first && isContextTag(first, 0)) {
    const version = expectInteger(explicitContent(first, 0, "version"), "version");
    if (version !== 0n) {
      throw new DecodeError(`Unsupported RouteOriginAttestation version ${version}`);
    }
    if (strict) {
      throw new DecodeError("RouteOriginAttestation.version: default value must not be encoded");
    }
    fields = fields.slice(1);
  }

  if (fields.length !== 2) {
    throw new DecodeError(
      `RouteOriginAttestation: expected asID and ipAddrBlocks (got ${fields.length} fields)`,
    );
  }
  const [asIdBlock, blocks] = fields;

  const asId = expectInteger(asIdBlock, "asID");
  if (asId < 0n || asId > MAX_ASN) {
    throw new DecodeError(`asID ${asId} is out of range`);
  }

  const families = children(expectSequence(blocks, "ipAddrBlocks"));
  if (families.length === 0) {
    throw new DecodeError("ipAddrBlocks: at least one address family is required");
  }

  const prefixes: Record<AddressFamily, string[]> = { ipv4: [], ipv6: [] };
  const seen: AddressFamily[] = [];

  for (const familyBlock of families) {
    const [familyId, addresses] = elements(
      expectSequence(familyBlock, "ROAIPAddressFamily"),
      "ROAIPAddressFamily",
      2,
    );
    const family = addressFamily(octets(familyId, "addressFamily", strict));

    if (strict) {
      if (seen.includes(family)) {
        throw new DecodeError(`ipAddrBlocks: ${family} appears more than once`);
      }
      if (family === "ipv4" && seen.includes("ipv6")) {
        throw new DecodeError("ipAddrBlocks: ipv4 must precede ipv6");
      }
    }
    seen.push(family);

    const entries = children(expectSequence(addresses, "addresses"));
    if (entries.length === 0) {
      throw new DecodeError(`${family} address list is empty`);
    }

    for (const entry of entries) {
      prefixes[family].push(readAddress(entry, family, strict));
    }
  }

  return {
    asn: `AS${asId}`,
    v4Prefixes: prefixes.ipv4,
    v6Prefixes: prefixes.ipv6,
  };
}

function readAddress(entry: asn1js.BaseBlock, family: AddressFamily, strict: boolean): string {
  const fields = children(expectSequence(entry, "ROAIPAddress"));
  const [addressBlock, maxLengthBlock] = fields;
  if (fields.length < 1 || fields.length > 2 || !addressBlock) {
    throw new DecodeError("ROAIPAddress: expected address and optional maxLength");
  }

  if (!(addressBlock instanceof asn1js.BitString)) {
    throw new DecodeError("ROAIPAddress.address: expected BIT STRING");
  }
  if (addressBlock.valueBlock.isConstructed) {
    throw new DecodeError("ROAIPAddress.address: constructed BIT STRING is not supported");
  }

  const prefix = prefixFromBitString(
    family,
    addressBlock.valueBlock.valueHexView,
    addressBlock.valueBlock.unusedBits,
    strict,
  );

  if (maxLengthBlock) {
    const maxLength = expectInteger(maxLengthBlock, "ROAIPAddress.maxLength");
    if (
      strict &&
      (maxLength < BigInt(prefix.length) || maxLength > BigInt(ADDRESS_BITS[family]))
    ) {
      throw new DecodeError(
        `maxLength ${maxLength} is outside ${prefix.length}..${ADDRESS_BITS[family]}`,
      );
    }
  }

  return formatPrefix(prefix);
}

function addressFamily(afi: Uint8Array): AddressFamily {
  if (afi.length < 2 || afi.length > 3) {
    throw new DecodeError(`addressFamily must be 2 or 3 octets (got ${afi.length})`);
  }
  const value = ((afi[0] ?? 0) << 8) | (afi[1] ?? 0);
  switch (value) {
    case 1:
      return "ipv4";
    case 2:
      return "ipv6";
    default:
      throw new DecodeError(`Unsupported address family ${value}`);
  }
}

function parseBer(bytes: Uint8Array, what: string, strict: boolean): asn1js.BaseBlock {
  const parsed = asn1js.fromBER(bytes);
  if (parsed.offset === -1) {
    throw new DecodeError(`${what}: ${parsed.result.error || "invalid BER encoding"}`);
  }
  if (strict && parsed.offset !== bytes.byteLength) {
    throw new DecodeError(`${what}: ${bytes.byteLength - parsed.offset} trailing bytes`);
  }
  return parsed.result;
}

function children(block: asn1js.Sequence): asn1js.BaseBlock[] {
  return block.valueBlock.value;
}

/**
 * Returns the first `count` elements of a SEQUENCE, failing if any is missing.
 */
function elements(
  block: asn1js.Sequence,
  what: string,
  count: number,
): asn1js.BaseBlock[] {
  const values = children(block);
  if (values.length < count) {
    throw new DecodeError(`${what}: expected at least ${count} elements (got ${values.length})`);
  }
  return values.slice(0, count);
}

function expectSequence(block: asn1js.BaseBlock | undefined, what: string): asn1js.Sequence {
  if (!(block instanceof asn1js.Sequence)) {
    throw new DecodeError(`${what}: expected SEQUENCE`);
  }
  return block;
}

function expectOid(block: asn1js.BaseBlock | undefined, what: string): string {
  if (!(block instanceof asn1js.ObjectIdentifier)) {
    throw new DecodeError(`${what}: expected OBJECT IDENTIFIER`);
  }
  return block.valueBlock.toString();
}

/**
 * Reads an INTEGER of any width. `valueDec` only covers short encodings, so
 * values are range-checked as bigints before they are used.
 */
function expectInteger(block: asn1js.BaseBlock | undefined, what: string): bigint {
  if (!(block instanceof asn1js.Integer)) {
    throw new DecodeError(`${what}: expected INTEGER`);
  }
  return block.toBigInt();
}

function isContextTag(block: asn1js.BaseBlock, tagNumber: number): boolean {
  return block.idBlock.tagClass === CONTEXT_SPECIFIC && block.idBlock.tagNumber === tagNumber;
}

function explicitContent(
  block: asn1js.BaseBlock | undefined,
  tagNumber: number,
  what: string,
): asn1js.BaseBlock {
  if (!(block instanceof asn1js.Constructed) || !isContextTag(block, tagNumber)) {
    throw new DecodeError(`${what}: expected [${tagNumber}] EXPLICIT`);
  }
  const inner = block.valueBlock.value[0];
  if (!inner || block.valueBlock.value.length !== 1) {
    throw new DecodeError(`${what}: expected exactly one inner element`);
  }
  return inner;
}

function octets(block: asn1js.BaseBlock | undefined, what: string, strict: boolean): Uint8Array {
  if (!(block instanceof asn1js.OctetString)) {
    throw new DecodeError(`${what}: expected OCTET STRING`);
  }
  if (!block.valueBlock.isConstructed) {
    return block.valueBlock.valueHexView;
  }
  if (strict) {
    throw new DecodeError(`${what}: constructed OCTET STRING is not DER`);
  }

  const parts = block.valueBlock.value.map((part) => octets(part, what, false));
  const joined = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.length;
  }
  return joined;
}
