// @provtag/contracts
// Record shapes, closed enum sets and patterns.

export * from "./schema/provenance_tag_v1";
export * from "./schema/series_v1";
export * from "./schema/patterns";
