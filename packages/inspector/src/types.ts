import type { GroupStatus, PassStats } from '@slot-cache/core';

export type InspectorNodeKind = 'group' | 'state';

export interface InspectorGraphNode {
  /** `group:<id>` or `state:<groupId>:<slotKey>` */
  id: string;
  kind: InspectorNodeKind;
  label: string;
  path: string;
  /** Groups only */
  status?: GroupStatus;
  /** Stored result (groups) or value (state cells) */
  preview: string;
}

export type InspectorEdgeKind = 'child' | 'owns' | 'reads';

export interface InspectorGraphEdge {
  id: string;
  source: string;
  target: string;
  kind: InspectorEdgeKind;
}

export interface InspectorGraph {
  generation: number;
  nodes: InspectorGraphNode[];
  edges: InspectorGraphEdge[];
}

export interface PassRecord extends PassStats {
  /** ISO timestamp of the commit */
  recordedAt: string;
}
