import {
  isAcctAgeBucket,
  isAcctType,
  isAutomationFlag,
  isClientFamily,
  isDedupHash,
  isIso3166Code,
  isMediaProvenance,
  isPostKind,
  type ProvenanceTagV1,
} from "@provtag/contracts";

import { FailureCode, failure, type ValidationFailure } from "./failure";
import { MultiError } from "./multi_error";

type EnumField = keyof Pick<
  ProvenanceTagV1,
  "acct_age_bucket" | "acct_type" | "automation_flag" | "post_kind" | "client_family" | "media_provenance"
>;

// Fixed check order: reported messages follow it.
const ENUM_CHECKS: ReadonlyArray<readonly [EnumField, (x: unknown) => boolean]> = [
  ["acct_age_bucket", isAcctAgeBucket],
  ["acct_type", isAcctType],
  ["automation_flag", isAutomationFlag],
  ["post_kind", isPostKind],
  ["client_family", isClientFamily],
  ["media_provenance", isMediaProvenance],
];

// Accepts "" or an ISO-3166 country / country-subdivision code ("US", "US-CA").
function checkOriginHint(code: string): ValidationFailure | null {
  if (code === "" || isIso3166Code(code)) return null; // empty hint is allowed
  return failure(
    FailureCode.MALFORMED_VARIABLE_PATTERN,
    "origin_hint",
    "origin_hint/country must match ISO-3166 pattern (e.g., US or US-CA)"
  );
}

/**
 * Checks every invariant of a single provenance tag.
 *
 * Returns null when the tag is valid, otherwise a MultiError listing all
 * violations in check order: enum fields, then dedup_hash, then origin_hint.
 */
export function validateProvenanceTag(tag: ProvenanceTagV1): MultiError | null {
  const me = new MultiError(); // fresh per call, never shared

  for (const [field, isMember] of ENUM_CHECKS) {
    if (!isMember(tag[field])) { // closed-set membership
      me.append(failure(FailureCode.INVALID_ENUM_VALUE, field, `invalid ${field}`));
    }
  }

  if (!isDedupHash(tag.dedup_hash)) { // exactly 8 lowercase hex chars
    me.append(
      failure(FailureCode.MALFORMED_FIXED_PATTERN, "dedup_hash", "dedup_hash must be 8 lowercase hex chars")
    );
  }
  me.append(checkOriginHint(tag.origin_hint)); // null when empty or well-formed

  return me.nilOrError(); // null means valid
}

export function isValidProvenanceTag(tag: ProvenanceTagV1): boolean {
  return validateProvenanceTag(tag) === null;
}
