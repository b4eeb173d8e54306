import * as asn1js from "asn1js";
import { OID_ROUTE_ORIGIN_AUTHZ, OID_SIGNED_DATA } from "../../src/roa/roa-decoder.ts";

const OID_SHA256 = "2.16.840.1.101.3.4.2.1";

export interface FixtureAddress {
  bits: number[];
  unusedBits?: number;
  maxLength?: number;
}

export interface FixtureFamily {
  afi: number[];
  addresses: FixtureAddress[];
}

export interface RoaFixture {
  asId: number | bigint;
  families: FixtureFamily[];
  /** Encodes the DEFAULT version explicitly when set. */
  version?: number;
  eContentType?: string;
  contentType?: string;
  signedDataVersion?: number;
  signerInfos?: boolean;
}

export const IPV4 = [0, 1];
export const IPV6 = [0, 2];

function explicit(tagNumber: number, inner: asn1js.BaseBlock): asn1js.Constructed {
  return new asn1js.Constructed({
    idBlock: { tagClass: 3, tagNumber },
    value: [inner],
  });
}

export function buildAttestation(fixture: RoaFixture): Uint8Array {
  const families = fixture.families.map(
    (family) =>
      new asn1js.Sequence({
        value: [
          new asn1js.OctetString({ valueHex: new Uint8Array(family.afi) }),
          new asn1js.Sequence({
            value: family.addresses.map(
              (address) =>
                new asn1js.Sequence({
                  value: [
                    new asn1js.BitString({
                      valueHex: new Uint8Array(address.bits),
                      unusedBits: address.unusedBits ?? 0,
                    }),
                    ...(address.maxLength === undefined
                      ? []
                      : [asn1js.Integer.fromBigInt(BigInt(address.maxLength))]),
                  ],
                }),
            ),
          }),
        ],
      }),
  );

  const attestation = new asn1js.Sequence({
    value: [
      ...(fixture.version === undefined
        ? []
        : [explicit(0, new asn1js.Integer({ value: fixture.version }))]),
      asn1js.Integer.fromBigInt(BigInt(fixture.asId)),
      new asn1js.Sequence({ value: families }),
    ],
  });

  return new Uint8Array(attestation.toBER(false));
}

/**
 * Wraps a RouteOriginAttestation in a CMS ContentInfo/SignedData envelope.
 * The signer info is a placeholder: the decoder does not verify signatures.
 */
export function buildRoa(fixture: RoaFixture): Uint8Array {
  const encapContentInfo = new asn1js.Sequence({
    value: [
      new asn1js.ObjectIdentifier({ value: fixture.eContentType ?? OID_ROUTE_ORIGIN_AUTHZ }),
      explicit(0, new asn1js.OctetString({ valueHex: buildAttestation(fixture) })),
    ],
  });

  const signedData = new asn1js.Sequence({
    value: [
      new asn1js.Integer({ value: fixture.signedDataVersion ?? 3 }),
      new asn1js.Set({
        value: [new asn1js.Sequence({ value: [new asn1js.ObjectIdentifier({ value: OID_SHA256 })] })],
      }),
      encapContentInfo,
      ...(fixture.signerInfos === false
        ? []
        : [new asn1js.Set({ value: [new asn1js.Sequence({ value: [new asn1js.Integer({ value: 3 })] })] })]),
    ],
  });

  const contentInfo = new asn1js.Sequence({
    value: [
      new asn1js.ObjectIdentifier({ value: fixture.contentType ?? OID_SIGNED_DATA }),
      explicit(0, signedData),
    ],
  });

  return new Uint8Array(contentInfo.toBER(false));
}
