import type { SlotCache, SlotGroupSnapshot } from '@slot-cache/core';
import type { InspectorGraph, InspectorGraphEdge, InspectorGraphNode, PassRecord } from './types.js';

export interface CacheInspectorOptions {
  /** Passes kept in the history, default 50 */
  historyLimit?: number;
  /** Called after an invalidation was queued, so the host can run a pass */
  onInvalidate?: () => void;
}

const CHANGED_KEY_PREFIX = 'c:';

function groupNodeId(id: number): string {
  return `group:${id}`;
}

/**
 * Service that attaches to a SlotCache and exposes its structure and history
 */
export class CacheInspector {
  private readonly historyLimit: number;
  private readonly onInvalidate: (() => void) | undefined;
  private readonly history: PassRecord[] = [];
  private detachListener: (() => void) | null;

  constructor(
    private readonly cache: SlotCache,
    options: CacheInspectorOptions = {}
  ) {
    this.historyLimit = options.historyLimit ?? 50;
    this.onInvalidate = options.onInvalidate;
    this.detachListener = cache.onPass((stats) => {
      this.history.push({ ...stats, recordedAt: new Date().toISOString() });
      if (this.history.length > this.historyLimit) {
        this.history.splice(0, this.history.length - this.historyLimit);
      }
    });
  }

  /**
   * Recorded passes, oldest first
   */
  listPasses(): PassRecord[] {
    return [...this.history];
  }

  dump(): string {
    return this.cache.dump();
  }

  /**
   * Build the group / state graph from the current slot table
   */
  getGraph(): InspectorGraph {
    const nodes: InspectorGraphNode[] = [];
    const edges: InspectorGraphEdge[] = [];

    const visit = (group: SlotGroupSnapshot): void => {
      const groupId = groupNodeId(group.id);
      nodes.push({
        id: groupId,
        kind: 'group',
        label: group.label || 'root',
        path: group.path,
        status: group.status,
        preview: group.result,
      });

      // `changed` baselines (memo arguments included) are bookkeeping, not state
      for (const value of group.values.filter((v) => !v.key.startsWith(CHANGED_KEY_PREFIX))) {
        const stateId = `state:${group.id}:${value.key}`;
        nodes.push({
          id: stateId,
          kind: 'state',
          label: value.path.split('/').pop() ?? value.key,
          path: value.path,
          preview: value.preview,
        });
        edges.push({ id: `${groupId}->${stateId}`, source: groupId, target: stateId, kind: 'owns' });
        for (const reader of value.readers) {
          const readerId = groupNodeId(reader);
          edges.push({ id: `${readerId}~>${stateId}`, source: readerId, target: stateId, kind: 'reads' });
        }
      }

      for (const child of group.children) {
        const childId = groupNodeId(child.id);
        edges.push({ id: `${groupId}->${childId}`, source: groupId, target: childId, kind: 'child' });
        visit(child);
      }
    };

    visit(this.cache.snapshot());
    return { generation: this.cache.generation, nodes, edges };
  }

  /**
   * Queue an invalidation of group `id`. Throws when no live group has that id.
   */
  invalidateGroup(id: number): void {
    if (!this.cache.invalidateGroup(id)) {
      throw new Error(`Group not found: ${id}`);
    }
    this.onInvalidate?.();
  }

  needsPass(): boolean {
    return this.cache.needsPass();
  }

  detach(): void {
    this.detachListener?.();
    this.detachListener = null;
  }
}
