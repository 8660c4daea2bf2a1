export { CacheInspector } from './inspector.js';
export type { CacheInspectorOptions } from './inspector.js';
export { createInspectorRouter } from './router.js';
export { startInspectorServer } from './server.js';
export type { InspectorServerOptions } from './server.js';
export type {
  InspectorEdgeKind,
  InspectorGraph,
  InspectorGraphEdge,
  InspectorGraphNode,
  InspectorNodeKind,
  PassRecord,
} from './types.js';
