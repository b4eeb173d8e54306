import { z } from "zod";
import type { UnknownFieldPolicy } from "../../types/config.ts";
import type {
  RoaSetResult,
  StatusResult,
  ValidityResult,
  Vrp,
} from "../../types/rpki.ts";

export type DecodeOutcome<T> = { ok: true; value: T } | { ok: false; issues: string };

/**
 * ResponseSchema decodes a parsed JSON body into a typed result.
 */
export interface ResponseSchema<T> {
  readonly name: string;
  decode(raw: unknown): DecodeOutcome<T>;
}

export interface ResponseSchemas {
  status: ResponseSchema<StatusResult>;
  validity: ResponseSchema<ValidityResult>;
  roas: ResponseSchema<RoaSetResult>;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

function fromZod<W, T>(
  name: string,
  schema: z.ZodType<W, z.ZodTypeDef, unknown>,
  normalize: (wire: W) => T,
): ResponseSchema<T> {
  return {
    name,
    decode(raw) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, issues: formatIssues(parsed.error) };
      }
      return { ok: true, value: normalize(parsed.data) };
    },
  };
}

// Some relying parties render lengths as decimal strings.
const length = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, "expected a decimal length").transform(Number),
]);

/**
 * Builds the wire schemas for one unknown-field policy. Field names follow the
 * upstream documents; the normalizers map them onto the result types.
 */
export function createResponseSchemas(policy: UnknownFieldPolicy): ResponseSchemas {
  const record = <T extends z.ZodRawShape>(shape: T) =>
    policy === "reject" ? z.object(shape).strict() : z.object(shape).strip();

  const statusSuccess = record({
    version: z.string(),
    serial: z.number().int().nonnegative(),
    now: z.string(),
    lastUpdateStart: z.string(),
    lastUpdateDone: z.string(),
    lastUpdateDuration: z.number(),
  });

  const statusError = record({
    error: z.string(),
  });

  const vrp = record({
    asn: z.string(),
    prefix: z.string(),
    max_length: length,
  });

  const validity = record({
    validated_route: record({
      route: record({
        origin_asn: z.string(),
        prefix: z.string(),
      }),
      validity: record({
        state: z.string(),
        description: z.string(),
        VRPs: record({
          matched: z.array(vrp),
          unmatched_as: z.array(vrp),
          unmatched_length: z.array(vrp),
        }),
      }),
    }),
    generatedTime: z.string(),
  });

  const roas = record({
    metadata: record({
      generated: z.number().int(),
      generatedTime: z.string(),
    }),
    roas: z.array(
      record({
        asn: z.string(),
        prefix: z.string(),
        maxLength: length,
        ta: z.string(),
      }),
    ),
  });

  const toVrp = (entry: z.infer<typeof vrp>): Vrp => ({
    asn: entry.asn,
    prefix: entry.prefix,
    maxLength: entry.max_length,
  });

  return {
    status: {
      name: "status",
      // Success first, then the error document. A body that fits neither is a
      // decode failure, never an error result.
      decode(raw) {
        const success = statusSuccess.safeParse(raw);
        if (success.success) {
          return { ok: true, value: { kind: "success", ...success.data } };
        }
        const failure = statusError.safeParse(raw);
        if (failure.success) {
          return { ok: true, value: { kind: "error", error: failure.data.error } };
        }
        return {
          ok: false,
          issues: `matches neither the status document (${formatIssues(success.error)}) nor the error document (${formatIssues(failure.error)})`,
        };
      },
    },
    validity: fromZod("validity", validity, (wire): ValidityResult => ({
      route: {
        originAsn: wire.validated_route.route.origin_asn,
        prefix: wire.validated_route.route.prefix,
      },
      validity: {
        state: wire.validated_route.validity.state,
        description: wire.validated_route.validity.description,
        vrps: {
          matched: wire.validated_route.validity.VRPs.matched.map(toVrp),
          unmatchedAs: wire.validated_route.validity.VRPs.unmatched_as.map(toVrp),
          unmatchedLength: wire.validated_route.validity.VRPs.unmatched_length.map(toVrp),
        },
      },
      generatedTime: wire.generatedTime,
    })),
    roas: fromZod("roas", roas, (wire): RoaSetResult => ({
      metadata: {
        generated: wire.metadata.generated,
        generatedTime: wire.metadata.generatedTime,
      },
      roas: wire.roas.map((entry) => ({
        asn: entry.asn,
        prefix: entry.prefix,
        maxLength: entry.maxLength,
        trustAnchor: entry.ta,
      })),
    })),
  };
}
