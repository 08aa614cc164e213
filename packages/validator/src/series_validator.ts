import { isUnsetTimestamp, SERIES_INTERVAL_V1, type PointV1, type SeriesV1 } from "@provtag/contracts";

import { FailureCode, failure } from "./failure";
import { MultiError } from "./multi_error";

// Comparisons are written so that NaN fails them.
function inUnitRange(v: number): boolean {
  return v >= 0 && v <= 1;
}

function isNonNegative(v: number): boolean {
  return v >= 0;
}

function checkUnitRange(me: MultiError, field: string, v: number): void {
  if (!inUnitRange(v)) me.append(failure(FailureCode.OUT_OF_RANGE_VALUE, field, `${field} must be 0–1`)); // inclusive on both ends
}

// Counts: one failure per field, sign first, then whole-number.
function checkCount(me: MultiError, field: string, v: number): void {
  if (!isNonNegative(v)) me.append(failure(FailureCode.OUT_OF_RANGE_VALUE, field, `${field} must be ≥0`));
  else if (!Number.isInteger(v)) me.append(failure(FailureCode.OUT_OF_RANGE_VALUE, field, `${field} must be an integer`));
}

function checkPoint(me: MultiError, p: PointV1, i: number): void {
  const at = `points[${i}]`; // index goes into every message
  const cs = p.coordination_signals;

  checkCount(me, `${at}.volume`, p.volume);
  checkUnitRange(me, `${at}.reshare_ratio`, p.reshare_ratio);
  checkUnitRange(me, `${at}.recycled_content_rate`, p.recycled_content_rate);
  checkUnitRange(me, `${at}.coordination_signals.burst_score`, cs.burst_score);
  checkUnitRange(me, `${at}.coordination_signals.synchrony_index`, cs.synchrony_index);
  checkCount(me, `${at}.coordination_signals.duplication_clusters`, cs.duplication_clusters);
}

/**
 * Checks a series and all of its points.
 *
 * Entity-level failures come first, then per-point failures in ascending
 * index order. Every check runs; nothing exits early.
 */
export function validateSeries(series: SeriesV1): MultiError | null {
  const me = new MultiError(); // fresh per call, never shared

  if (series.topic === "") {
    me.append(failure(FailureCode.EMPTY_REQUIRED_FIELD, "topic", "topic must be non-empty"));
  }
  if (isUnsetTimestamp(series.generated_at)) {
    me.append(failure(FailureCode.UNSET_REQUIRED_FIELD, "generated_at", "generated_at must be set")); // invalid Date or epoch 0
  }
  if (series.interval !== SERIES_INTERVAL_V1) {
    me.append(
      failure(FailureCode.INVALID_ENUM_VALUE, "interval", `interval must be "${SERIES_INTERVAL_V1}"`)
    );
  }
  if (series.points.length === 0) {
    me.append(
      failure(FailureCode.EMPTY_REQUIRED_COLLECTION, "points", "series must contain at least one point")
    ); // zero points also means zero per-point checks below
  }

  series.points.forEach((p, i) => checkPoint(me, p, i)); // ascending index order

  return me.nilOrError();
}

export function isValidSeries(series: SeriesV1): boolean {
  return validateSeries(series) === null;
}
