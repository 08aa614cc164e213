import { z } from "zod";

// Closed sets for ProvenanceTagV1. Order is the order validators report in.

export const ACCT_AGE_BUCKETS_V1 = ["0-7d", "8-30d", "1-6m", "6-24m", "24m+"] as const;

export const ACCT_TYPES_V1 = [
  "person",
  "org",
  "media",
  "public_official",
  "unverified",
  "declared_automation",
] as const;

export const AUTOMATION_FLAGS_V1 = ["manual", "scheduled", "api_client", "declared_bot"] as const;

export const POST_KINDS_V1 = ["original", "reshare", "quote", "reply"] as const;

export const CLIENT_FAMILIES_V1 = ["web", "mobile", "third_party"] as const;

// c2pa_present: a C2PA manifest was attached; hash_only: a content hash but no manifest.
export const MEDIA_PROVENANCE_KINDS_V1 = ["c2pa_present", "hash_only", "none"] as const;

export type AcctAgeBucket = (typeof ACCT_AGE_BUCKETS_V1)[number];
export type AcctType = (typeof ACCT_TYPES_V1)[number];
export type AutomationFlag = (typeof AUTOMATION_FLAGS_V1)[number];
export type PostKind = (typeof POST_KINDS_V1)[number];
export type ClientFamily = (typeof CLIENT_FAMILIES_V1)[number];
export type MediaProvenance = (typeof MEDIA_PROVENANCE_KINDS_V1)[number];

function inAllowlist<T extends string>(allowlist: readonly T[], x: unknown): x is T {
  return typeof x === "string" && (allowlist as readonly string[]).includes(x);
}

export function isAcctAgeBucket(x: unknown): x is AcctAgeBucket {
  return inAllowlist(ACCT_AGE_BUCKETS_V1, x);
}

export function isAcctType(x: unknown): x is AcctType {
  return inAllowlist(ACCT_TYPES_V1, x);
}

export function isAutomationFlag(x: unknown): x is AutomationFlag {
  return inAllowlist(AUTOMATION_FLAGS_V1, x);
}

export function isPostKind(x: unknown): x is PostKind {
  return inAllowlist(POST_KINDS_V1, x);
}

export function isClientFamily(x: unknown): x is ClientFamily {
  return inAllowlist(CLIENT_FAMILIES_V1, x);
}

export function isMediaProvenance(x: unknown): x is MediaProvenance {
  return inAllowlist(MEDIA_PROVENANCE_KINDS_V1, x);
}

/**
 * ProvenanceTagV1Schema
 *
 * NOTE: shape only. Enum fields stay open strings so that out-of-set values
 * can be represented and reported by @provtag/validator.
 */
export const ProvenanceTagV1Schema = z.object({
  acct_age_bucket: z.string(),
  acct_type: z.string(),
  automation_flag: z.string(),
  post_kind: z.string(),
  client_family: z.string(),
  media_provenance: z.string(),
  dedup_hash: z.string(),
  // "" when the origin is unknown
  origin_hint: z.string().default(""),
});

export type ProvenanceTagV1 = z.infer<typeof ProvenanceTagV1Schema>;
