import { logger } from '../dev/logger';
import type { NodeRef } from '../runtime/facets';
import { toCssColor } from '../value/color';
import { isTruthy, toText } from '../value/value';
import type {
  MaterializedNode,
  MaterializedTree,
  PatchOp,
  PatchSink,
  PropOutput,
  UserEvent,
} from './types';

export const REF_ATTRIBUTE = 'data-prism-ref';
export const KIND_ATTRIBUTE = 'data-prism-kind';

/** Element tag per view node kind; anything unlisted becomes a div. */
const TAGS: Readonly<Record<string, string>> = {
  text: 'span',
  label: 'span',
  button: 'button',
  input: 'input',
  text_input: 'input',
  checkbox: 'input',
  textarea: 'textarea',
  image: 'img',
};

export interface DomRendererOptions {
  /** Receives hit-tested user input; wire this to `Runtime.dispatch`. */
  onEvent?: (ref: NodeRef, event: UserEvent) => void;
}

export interface DomRenderer extends PatchSink {
  readonly container: Element;
  elementFor(ref: NodeRef): HTMLElement | undefined;
  /** Remove every element and listener this renderer created. */
  destroy(): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Element construction
// ─────────────────────────────────────────────────────────────────────────────

function createElementFor(doc: Document, node: MaterializedNode): HTMLElement {
  const el = doc.createElement(TAGS[node.kind] ?? 'div');
  el.setAttribute(REF_ATTRIBUTE, String(node.ref));
  el.setAttribute(KIND_ATTRIBUTE, node.kind);
  if (node.kind === 'checkbox') el.setAttribute('type', 'checkbox');
  return el;
}

function isFormField(
  el: HTMLElement
): el is HTMLInputElement | HTMLTextAreaElement {
  return el.tagName === 'INPUT' || el.tagName === 'TEXTAREA';
}

function isCheckbox(el: HTMLElement): el is HTMLInputElement {
  return el instanceof HTMLInputElement && el.type === 'checkbox';
}

function attributeText(value: PropOutput): string | null {
  if (value.kind === 'color') return toCssColor(value);
  if (value.kind === 'null') return null;
  return toText(value);
}

function writeProp(el: HTMLElement, name: string, value: PropOutput): void {
  if (name === 'value' && isFormField(el)) {
    if (isCheckbox(el)) {
      el.checked = value.kind !== 'color' && isTruthy(value);
      return;
    }
    const next = attributeText(value) ?? '';
    // Re-setting an identical value would move the caret
    if (el.value !== next) el.value = next;
    return;
  }

  const text = attributeText(value);
  if (text === null) el.removeAttribute(name);
  else el.setAttribute(name, text);
}

// ─────────────────────────────────────────────────────────────────────────────
// Renderer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Patch sink that keeps one element per view node under `container`.
 *
 * mount() rebuilds the element tree from scratch; apply() only touches the
 * elements named by the patches. Elements are looked up by ref, so the
 * sink never walks the DOM to find a node.
 */
export function createDomRenderer(
  container: Element,
  options: DomRendererOptions = {}
): DomRenderer {
  const doc = container.ownerDocument;
  let elements: HTMLElement[] = [];
  let textNodes = new Map<NodeRef, Text>();
  const listeners: Array<() => void> = [];

  const listen = (
    el: HTMLElement,
    type: string,
    handler: (ev: Event) => void
  ): void => {
    el.addEventListener(type, handler);
    listeners.push(() => el.removeEventListener(type, handler));
  };

  const unlisten = (): void => {
    for (const remove of listeners.splice(0)) remove();
  };

  const wireEvents = (el: HTMLElement, node: MaterializedNode): void => {
    const onEvent = options.onEvent;
    if (!onEvent) return;
    const { ref } = node;

    if (node.handlers.on_click !== undefined) {
      listen(el, 'click', () => onEvent(ref, { type: 'click' }));
    }
    if (node.handlers.on_change !== undefined) {
      listen(el, 'change', () => onEvent(ref, { type: 'change' }));
    }
    // Checkbox bindings are one-way; toggling goes through on_change
    if (node.binding !== undefined && isFormField(el) && !isCheckbox(el)) {
      const field = el;
      listen(field, 'input', () =>
        onEvent(ref, { type: 'input', value: field.value })
      );
    }
  };

  const build = (tree: MaterializedTree, ref: NodeRef): HTMLElement => {
    const node = tree.nodes[ref];
    const el = createElementFor(doc, node);
    elements[ref] = el;
    if (node.text !== undefined) {
      const textNode = doc.createTextNode('');
      textNodes.set(ref, textNode);
      el.appendChild(textNode);
    }
    for (const child of node.children) el.appendChild(build(tree, child));
    wireEvents(el, node);
    return el;
  };

  const applyOne = (patch: PatchOp): void => {
    const el = elements[patch.ref];
    if (!el) {
      logger.warn(`Patch for unknown node ${patch.ref} ignored`);
      return;
    }
    switch (patch.op) {
      case 'set-text': {
        const textNode = textNodes.get(patch.ref);
        if (textNode) textNode.data = patch.text;
        else el.textContent = patch.text;
        break;
      }
      case 'set-visible':
        el.hidden = !patch.visible;
        break;
      case 'set-prop':
        writeProp(el, patch.name, patch.value);
        break;
    }
  };

  return {
    container,

    mount(tree, patches) {
      unlisten();
      container.replaceChildren();
      elements = [];
      textNodes = new Map();
      if (tree.nodes.length > 0) container.appendChild(build(tree, 0));
      for (const patch of patches) applyOne(patch);
    },

    apply(patches) {
      for (const patch of patches) applyOne(patch);
    },

    elementFor(ref) {
      return elements[ref];
    },

    destroy() {
      unlisten();
      container.replaceChildren();
      elements = [];
      textNodes = new Map();
    },
  };
}
