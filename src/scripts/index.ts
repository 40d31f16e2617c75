export { default as CONSTANTS } from "./module/constants";
export {
  DEFAULT_CONVERTER_CONFIG,
  mapActionType,
  resolveConverterConfig,
  type ConverterConfig,
} from "./module/config";
export { LogLevel, addLogSink, getLogLevel, setLogLevel, type LogRecord, type LogSink } from "./utils";

export { normalize, sanitizeForLookup, summarizeTextChanges, validateRoundTrip } from "./text/normalizer";
export {
  auditTransfers,
  enhance,
  preserveFormatting,
  resolveDescription,
  validateTransfer,
  type TransferAudit,
} from "./text/rich-text";

export { Catalog, buildCatalog, type CatalogEntry, type Advancement } from "./catalog/catalog";
export { loadCatalogDirectory, parsePackFile, type CatalogLoadResult } from "./catalog/loader";
export { CatalogMatcher, UnresolvedEntityError, type CatalogMatch, type MatchTier } from "./catalog/catalog-resolver";
export { GrantExpander } from "./catalog/grant-expander";

export { ItemConverter, materializeEntry, type ConvertedItem } from "./mappers/item";
export { convertCharacter, type ConversionResult } from "./mappers/actor";
export type { ConversionIssue, ConversionReport } from "./mappers/report";

export { validate, formatError } from "./helpers/validation";
export { DocumentStructureError, ensureValidSource } from "./validation/ensure-valid";

export type { SourceDocument } from "./models/source";
export type { TargetActor, TargetItem, TargetItemType } from "./models/target";
