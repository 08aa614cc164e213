// Escalating wrappers for call sites that treat an invalid record as a bug.
// They add no checks of their own.

import type { ProvenanceTagV1, SeriesV1 } from "@provtag/contracts";
import type pino from "pino";

import { ValidationFailure } from "./failure";
import { getLogger } from "./logger";
import type { MultiError } from "./multi_error";
import { validateProvenanceTag } from "./provenance_tag_validator";
import { validateSeries } from "./series_validator";

function escalate(kind: string, err: MultiError, log: pino.Logger): never {
  log.error(
    {
      kind,
      failures: err.errors.map((e) =>
        e instanceof ValidationFailure ? { code: e.code, field: e.field } : { message: e.message }
      ), // structured view alongside the joined text
    },
    `${kind} failed validation: ${err.message}`
  );
  throw err; // escalation: the caller decided invalid input is fatal
}

/**
 * Throws the MultiError from validateProvenanceTag when the tag is invalid.
 *
 * @param log - Where the failure is reported before throwing; defaults to the "validator.must" category.
 */
export function mustProvenanceTag(tag: ProvenanceTagV1, log?: pino.Logger): void {
  const err = validateProvenanceTag(tag);
  if (err) escalate("provenance_tag", err, log ?? getLogger("validator.must"));
}

/** Throws the MultiError from validateSeries when the series is invalid. */
export function mustSeries(series: SeriesV1, log?: pino.Logger): void {
  const err = validateSeries(series);
  if (err) escalate("series", err, log ?? getLogger("validator.must"));
}
