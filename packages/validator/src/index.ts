// @provtag/validator
// Entry point exports.

export * from "./failure";
export * from "./multi_error";
export * from "./provenance_tag_validator";
export * from "./series_validator";
export * from "./must";
export * from "./config";
export * from "./logger";
