// ---------------------------------------------------------------------------
// @stockroom/registry — in-process catalog of definitions and instances
// ---------------------------------------------------------------------------

export {
  catalogKey,
  getDefaultRegistry,
  lineageOf,
  Registry,
  resetDefaultRegistry,
} from "./registry.js";
export {
  applyRegistrations,
  type RegistrationRecord,
  scopedRegistrar,
} from "./registrations.js";
export type {
  AddOptions,
  CatalogEntry,
  ConflictHandler,
  FindQuery,
  Registrar,
  RegistryOptions,
  RemoveWhereCriteria,
  ResultKey,
} from "./types.js";

// Package metadata
export const PACKAGE_NAME = "@stockroom/registry";
