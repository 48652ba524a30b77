/**
 * @secsearch/domain
 *
 * Core types, supported form types and the error taxonomy.
 */

export * from "./errors.js";
export * from "./forms.js";
export * from "./types.js";
