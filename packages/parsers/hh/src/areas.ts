import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { consoleLogger, type CoreLogger } from '@vacancy-scout/vacancy-sdk';
import type { PageFetcher } from './types.js';

export const UNRESOLVED_AREA_ID = '0';

export interface AreaLeaf {
  kind: 'leaf';
  id: string;
  name: string;
}

export interface AreaBranch {
  kind: 'branch';
  id: string;
  name: string;
  children: AreaNode[];
}

export type AreaNode = AreaLeaf | AreaBranch;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseAreaNode(raw: unknown): AreaNode | undefined {
  if (!isRecord(raw) || typeof raw.name !== 'string') {
    return undefined;
  }

  const id = typeof raw.id === 'string' || typeof raw.id === 'number' ? String(raw.id) : undefined;
  if (id === undefined) {
    return undefined;
  }

  const children = Array.isArray(raw.areas) ? parseAreaTree(raw.areas) : [];
  if (children.length === 0) {
    return { kind: 'leaf', id, name: raw.name };
  }

  return { kind: 'branch', id, name: raw.name, children };
}

/**
 * Accepts the provider payload as a list of nodes or a single node.
 * Malformed nodes are dropped together with their subtrees.
 */
export function parseAreaTree(raw: unknown): AreaNode[] {
  const list = Array.isArray(raw) ? raw : [raw];
  const nodes: AreaNode[] = [];

  for (const item of list) {
    const node = parseAreaNode(item);
    if (node) {
      nodes.push(node);
    }
  }

  return nodes;
}

/**
 * Pre-order depth-first search, case-insensitive on trimmed names.
 */
export function findAreaId(nodes: AreaNode[], name: string): string {
  const target = name.trim().toLowerCase();

  for (const node of nodes) {
    if (node.name.trim().toLowerCase() === target) {
      return node.id;
    }

    if (node.kind === 'branch') {
      const nested = findAreaId(node.children, target);
      if (nested !== UNRESOLVED_AREA_ID) {
        return nested;
      }
    }
  }

  return UNRESOLVED_AREA_ID;
}

export interface AreaResolverOptions {
  fetcher: PageFetcher;
  cachePath: string;
  logger?: CoreLogger;
}

/**
 * Resolves place names to hh area ids. The full area tree is downloaded once
 * and kept in `cachePath`; the cache never expires.
 */
export class AreaResolver {
  private readonly fetcher: PageFetcher;
  private readonly cachePath: string;
  private readonly logger: CoreLogger;
  private tree?: AreaNode[];

  constructor(options: AreaResolverOptions) {
    this.fetcher = options.fetcher;
    this.cachePath = options.cachePath;
    this.logger = options.logger ?? consoleLogger;
  }

  async resolveAreaId(name: string): Promise<string> {
    if (!name.trim()) {
      return UNRESOLVED_AREA_ID;
    }

    const tree = await this.loadTree();
    if (!tree) {
      return UNRESOLVED_AREA_ID;
    }

    const areaId = findAreaId(tree, name);
    this.logger.debug({ event: 'area_resolved', name, areaId }, 'Area name resolved');
    return areaId;
  }

  private async loadTree(): Promise<AreaNode[] | undefined> {
    if (this.tree) {
      return this.tree;
    }

    const raw = this.readCache() ?? (await this.fetchAndCache());
    if (raw === undefined) {
      return undefined;
    }

    this.tree = parseAreaTree(raw);
    return this.tree;
  }

  private readCache(): unknown {
    if (!existsSync(this.cachePath)) {
      return undefined;
    }

    try {
      const data: unknown = JSON.parse(readFileSync(this.cachePath, 'utf-8'));
      return data;
    } catch (error) {
      this.logger.warn(
        {
          event: 'area_cache_invalid',
          path: this.cachePath,
          error: error instanceof Error ? error.message : String(error),
        },
        'Area cache is unreadable, fetching a fresh copy',
      );
      return undefined;
    }
  }

  private async fetchAndCache(): Promise<unknown> {
    const data = await this.fetcher.fetchPage('areas', {});
    if (data === undefined) {
      return undefined;
    }

    try {
      mkdirSync(dirname(this.cachePath), { recursive: true });
      writeFileSync(this.cachePath, JSON.stringify(data, null, 4), 'utf-8');
    } catch (error) {
      this.logger.error(
        {
          event: 'area_cache_write_failed',
          path: this.cachePath,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to write area cache',
      );
    }

    return data;
  }
}
