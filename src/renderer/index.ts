// Renderer barrel entrypoint.
// Keep this file small: re-export the public surface only.

export * from './types';
export { materialize, reconcile, sizeOfNode } from './reconcile';
export type { MaterializeOptions } from './reconcile';
export {
  createDomRenderer,
  KIND_ATTRIBUTE,
  REF_ATTRIBUTE,
} from './dom';
export type { DomRenderer, DomRendererOptions } from './dom';
