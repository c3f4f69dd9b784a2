export { collectIdentifiers, createSourceFileUnit, SyntaxCodeUnit } from './code-unit';
export type { CodeUnit } from './code-unit';
export { harvestIdentifiers, harvestSource, Harvester, DEFAULT_INCLUDE, DEFAULT_IGNORE } from './harvest';
export type { HarvestOptions, HarvestResult, SkippedUnit } from './harvest';
export { isIdentifier } from './identifiers';
export type { IdentifierSet } from './identifiers';
export { cleanTypeName, createTypeCatalog, DEFAULT_LIST_SUFFIXES, DEFAULT_PLACEHOLDERS } from './catalog';
export type { CatalogSource, MemberKind, TypeCatalog, TypeCatalogOptions } from './catalog';
export { createCatalogSource, readCatalogFile } from './catalog-file';
export type { CatalogDescription } from './catalog-file';
export { DEFAULT_OVERRIDES, EMPTY_OVERRIDES, mergeOverrides, OverridePolicy, WILDCARD } from './policy';
export type { OverrideTables } from './policy';
export { computeClosure, UsefulReason } from './closure';
export type { ClosureObserver, ClosureOptions, ClosureResult } from './closure';
export { classifyMember, classifyType, findRejections, groupRejections, MemberStatus, summarizeRejections, TypeStatus } from './rejections';
export type { GroupedRejections, MemberRejection, RejectionInput, RejectionRecord, RejectionSummary, TypeRejection } from './rejections';
export { formatJson, formatTypesystem } from './typesystem';
export { readConfig, resolveConfig } from './config';
export type { Config, LoadedConfig } from './config';
export { createPolicy, runTrim } from './analyze';
export type { TrimOptions, TrimResult } from './analyze';
export { CatalogError, ConfigError, HarvestError } from './errors';
export { createLogger, silentLogger } from './logging';
export type { Logger, LogLevel } from './logging';
