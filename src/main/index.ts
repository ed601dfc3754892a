export { ProgramCatalog } from './program-catalog';
export type { CatalogListener, CatalogSource, CatalogStatus, ProgramCatalogOptions } from './program-catalog';
export { DEFAULT_CONFIG, loadLauncherConfig, normalizeLauncherConfig } from './launcher-config';
export type { InitialSort, LauncherConfig } from './launcher-config';
export { discoverPrograms, isPathInsideRoots } from './discovery';
export type { DiscoveryOptions, DiscoveryReport, DiscoveryWarning, DiscoveryWarningKind } from './discovery';
export { IconResolver, PLACEHOLDER_PALETTE, placeholderIcon } from './icon-resolver';
export { CACHE_VERSION, IndexCache, computeFingerprint } from './index-cache';
export type { IndexCacheRecord, LoadedIndex, ScanPlan } from './index-cache';
export { ProgramIndex } from './program-index';
export { SCORE_WEIGHTS, listIndex, searchIndex } from './fuzzy-search';
export type { SearchResult } from './fuzzy-search';
export { createEntry, normalizeName } from './program-entry';
export type { EntryOrigin, IconRef, ProgramEntry, ProgramRecord } from './program-entry';
export { parseDesktopEntry, parseShellLink } from './shortcut-file';
export { platform } from './platform';
export type { LauncherPlatform, ScanRoot, ShortcutResolver } from './platform';
