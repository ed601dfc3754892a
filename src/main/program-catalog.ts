/**
 * Program Catalog
 *
 * Owns the published ProgramIndex and everything that produces one:
 * - warm start from the index cache when its fingerprint still matches
 * - otherwise discovery + icon resolution, written back to the cache
 *
 * A new index is swapped in only once it is completely built, so queries
 * always see a whole snapshot. Queries themselves are synchronous and pure.
 */

import * as path from 'path';
import { discoverPrograms, type DiscoveryWarning, type DiscoveryWarningKind } from './discovery';
import { listIndex, searchIndex, type SearchResult } from './fuzzy-search';
import { IconResolver } from './icon-resolver';
import { IndexCache, computeFingerprint, type ScanPlan } from './index-cache';
import type { LauncherConfig } from './launcher-config';
import { platform as hostPlatform, type LauncherPlatform, type ScanRoot, type ShortcutResolver } from './platform';
import { ProgramIndex } from './program-index';

export type CatalogSource = 'cache' | 'discovery';

export interface ProgramCatalogOptions {
  config: LauncherConfig;
  /** Directory holding the index record and extracted icons */
  cacheDir: string;
  platform?: LauncherPlatform;
  /** Environment for the default roots and PATH lookups; process.env when omitted */
  env?: NodeJS.ProcessEnv;
  /** Replaces the platform's built-in roots; extra index paths are still appended */
  roots?: ScanRoot[];
  /** Replaces the platform's shortcut resolver */
  resolver?: ShortcutResolver;
}

export interface CatalogStatus {
  ready: boolean;
  indexing: boolean;
  source: CatalogSource | null;
  entryCount: number;
  lastBuiltAt: number | null;
  lastWarnings: DiscoveryWarning[];
  lastError: string | null;
}

export type CatalogListener = (index: ProgramIndex, source: CatalogSource) => void;

function summarizeWarnings(warnings: DiscoveryWarning[]): string {
  const counts = new Map<DiscoveryWarningKind, number>();
  for (const warning of warnings) {
    counts.set(warning.kind, (counts.get(warning.kind) || 0) + 1);
  }
  return Array.from(counts.entries())
    .map(([kind, count]) => `${count} ${kind}`)
    .join(', ');
}

export class ProgramCatalog {
  private readonly config: LauncherConfig;
  private readonly platform: LauncherPlatform;
  private readonly env: NodeJS.ProcessEnv;
  private readonly roots: ScanRoot[] | undefined;
  private readonly resolver: ShortcutResolver;
  private readonly icons: IconResolver;
  private readonly cache: IndexCache;

  private current: ProgramIndex = ProgramIndex.empty();
  private source: CatalogSource | null = null;
  private inflight: Promise<ProgramIndex> | null = null;
  private lastWarnings: DiscoveryWarning[] = [];
  private lastError: string | null = null;
  private readonly listeners = new Set<CatalogListener>();

  constructor(options: ProgramCatalogOptions) {
    this.config = options.config;
    this.platform = options.platform ?? hostPlatform;
    this.env = options.env ?? process.env;
    this.roots = options.roots;
    this.resolver = options.resolver ?? this.platform.createShortcutResolver(this.env);
    this.icons = new IconResolver({
      iconDir: path.join(options.cacheDir, 'icons'),
      platform: this.platform,
      iconSize: this.config.programIconSize,
    });
    this.cache = new IndexCache(options.cacheDir, this.icons);
  }

  /**
   * Roots in priority order followed by the configured extra paths.
   */
  scanPlan(): ScanPlan {
    const builtIn = this.roots ?? this.platform.defaultScanRoots(this.env);
    const extras = this.config.extraIndexPaths.map((dir): ScanRoot => ({ path: dir, origin: 'extra-path' }));
    return { roots: [...builtIn, ...extras], excludePaths: this.config.excludePaths };
  }

  /**
   * Builds the first index. Concurrent callers share one build; once ready,
   * resolves to the published index without doing any work.
   */
  start(): Promise<ProgramIndex> {
    if (this.source) return Promise.resolve(this.current);
    if (this.inflight) return this.inflight;
    return this.track(this.build(true));
  }

  /**
   * Forces full discovery, ignoring any cache record. A rebuild requested
   * while another build runs starts after it.
   */
  rebuild(): Promise<ProgramIndex> {
    const previous = this.inflight;
    const next = (async () => {
      if (previous) await previous;
      return this.build(false);
    })();
    return this.track(next);
  }

  search(query: string): SearchResult[] {
    return searchIndex(this.current, String(query ?? ''), this.config.maxResults);
  }

  listAll(): SearchResult[] {
    return listIndex(this.current, this.config.maxResults);
  }

  getIndex(): ProgramIndex {
    return this.current;
  }

  getStatus(): CatalogStatus {
    return {
      ready: this.source !== null,
      indexing: this.inflight !== null,
      source: this.source,
      entryCount: this.current.size,
      lastBuiltAt: this.source ? this.current.builtAt : null,
      lastWarnings: [...this.lastWarnings],
      lastError: this.lastError,
    };
  }

  subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  private track(promise: Promise<ProgramIndex>): Promise<ProgramIndex> {
    const tracked = promise.finally(() => {
      if (this.inflight === tracked) this.inflight = null;
    });
    this.inflight = tracked;
    return tracked;
  }

  private publish(index: ProgramIndex, source: CatalogSource): void {
    this.current = index;
    this.source = source;
    for (const listener of this.listeners) {
      try {
        listener(index, source);
      } catch (error) {
        console.error('[Catalog] Listener failed:', error);
      }
    }
  }

  private async build(allowCache: boolean): Promise<ProgramIndex> {
    const t0 = Date.now();
    const plan = this.scanPlan();
    const { enableCache, initialSort } = this.config;

    try {
      if (enableCache && allowCache) {
        const cached = await this.cache.load(plan);
        if (cached) {
          this.publish(ProgramIndex.build(cached.entries, { initialSort }), 'cache');
          this.lastError = null;
          console.log(`[Catalog] Loaded ${cached.entries.length} programs from cache in ${Date.now() - t0}ms`);
          return this.current;
        }
      }

      // Fingerprint before walking so changes made during the walk invalidate next time.
      const fingerprint = enableCache ? await computeFingerprint(plan) : '';

      const report = await discoverPrograms({
        roots: plan.roots,
        excludePaths: plan.excludePaths,
        shortcutExtensions: this.platform.shortcutExtensions,
        executableExtensions: this.platform.executableExtensions,
        resolver: this.resolver,
        caseInsensitivePaths: this.platform.caseInsensitivePaths,
      });
      this.lastWarnings = report.warnings;
      if (report.warnings.length > 0) {
        console.warn(`[Discovery] Skipped ${report.warnings.length} paths: ${summarizeWarnings(report.warnings)}`);
      }

      const entries = await this.icons.resolveAll(report.programs);
      this.publish(ProgramIndex.build(entries, { initialSort }), 'discovery');
      this.lastError = null;

      if (enableCache) {
        await this.cache.save(entries, fingerprint);
      }

      console.log(
        `Discovered ${entries.length} programs from ${report.candidateCount} candidates in ${Date.now() - t0}ms`
      );
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      console.error('[Catalog] Index build failed:', error);
    }

    return this.current;
  }
}
