export interface StatusSuccess {
  kind: "success";
  version: string;
  serial: number;
  now: string;
  lastUpdateStart: string;
  lastUpdateDone: string;
  lastUpdateDuration: number;
}

/**
 * StatusFailure is the relying party reporting its own error in a 2xx body.
 */
export interface StatusFailure {
  kind: "error";
  error: string;
}

export type StatusResult = StatusSuccess | StatusFailure;

/**
 * Vrp is a validated ROA payload: (ASN, prefix, max length).
 */
export interface Vrp {
  asn: string;
  prefix: string;
  maxLength: number;
}

export interface ValidityResult {
  route: {
    originAsn: string;
    prefix: string;
  };
  validity: {
    state: string;
    description: string;
    vrps: {
      matched: Vrp[];
      unmatchedAs: Vrp[];
      unmatchedLength: Vrp[];
    };
  };
  generatedTime: string;
}

export interface RoaEntry {
  asn: string;
  prefix: string;
  maxLength: number;
  trustAnchor: string;
}

export interface RoaSetResult {
  metadata: {
    generated: number;
    generatedTime: string;
  };
  roas: RoaEntry[];
}

export interface ParsedRoa {
  asn: string;
  v4Prefixes: string[];
  v6Prefixes: string[];
}
