import { describe, it, expect, vi, afterEach } from 'vitest';
import { node, program, prop } from '../../src/ast/build';
import { createRuntime } from '../../src/app/createRuntime';
import { createDomRenderer } from '../../src/renderer/dom';
import { loadProgram } from '../../src/runtime/program';
import { materialize } from '../../src/renderer/reconcile';
import { NULL, str } from '../../src/value/value';
import {
  counterProgram,
  formProgram,
  twoVariableProgram,
} from '../fixtures/programs';
import { createTestContainer, mountApp } from '../helpers/test_renderer';

describe('DOM patch sink (DOM)', () => {
  const cleanups: Array<() => void> = [];
  afterEach(() => {
    for (const cleanup of cleanups.splice(0)) cleanup();
  });

  function mount(...args: Parameters<typeof mountApp>) {
    const app = mountApp(...args);
    cleanups.push(app.cleanup);
    return app;
  }

  it('should mount one element per node with ref and kind attributes', () => {
    const { container } = mount(counterProgram());

    expect(container.innerHTML).toBe(
      '<div data-prism-ref="0" data-prism-kind="column">' +
        '<span data-prism-ref="1" data-prism-kind="text">Count: 0</span>' +
        '<button data-prism-ref="2" data-prism-kind="button" label="+"></button>' +
        '<button data-prism-ref="3" data-prism-kind="button" label="-"></button>' +
        '<span data-prism-ref="4" data-prism-kind="text" hidden="">Positive</span>' +
        '</div>'
    );
  });

  it('should update text in place and reveal nodes given a click', () => {
    const app = mount(counterProgram());
    const label = app.element(1);
    const textNode = label.firstChild;

    app.element(2).click();

    expect(label.textContent).toBe('Count: 1');
    expect(label.firstChild).toBe(textNode);
    expect(app.element(4).hidden).toBe(false);
  });

  it('should leave untouched elements alone', () => {
    const app = mount(counterProgram());
    const decrement = app.element(3);
    const setAttribute = vi.spyOn(decrement, 'setAttribute');

    app.element(2).click();

    expect(setAttribute).not.toHaveBeenCalled();
    expect(app.element(3)).toBe(decrement);
  });

  it('should write bound input values back into state', () => {
    const app = mount(formProgram());
    const input = app.element(1);
    if (!(input instanceof HTMLInputElement)) throw new Error('expected input');

    input.value = 'Ada';
    input.dispatchEvent(new Event('input'));

    expect(app.runtime.get('name')).toEqual(str('Ada'));
    expect(app.element(2).textContent).toBe('Hello, Ada!');
  });

  it('should push state changes into bound inputs', () => {
    const app = mount(formProgram());
    const input = app.element(1);
    if (!(input instanceof HTMLInputElement)) throw new Error('expected input');

    input.value = 'Ada';
    input.dispatchEvent(new Event('input'));
    app.element(3).click();

    expect(input.value).toBe('');
    expect(app.element(2).textContent).toBe('Hello, !');
  });

  it('should render colors as css rgba attributes', () => {
    const app = mount(twoVariableProgram());
    const row = app.element(4);
    expect(row.getAttribute('color')).toBe('rgba(244, 67, 54, 1)');
    expect(row.getAttribute('title')).toBe('x');
  });

  it('should reflect a bound boolean as the checked state of a checkbox', () => {
    const app = mount(
      program({
        app: 'Check',
        state: { done: true },
        view: node('checkbox', { bind: prop.ident('done') }),
      })
    );
    const box = app.element(0);
    if (!(box instanceof HTMLInputElement)) throw new Error('expected input');

    expect(box.type).toBe('checkbox');
    expect(box.checked).toBe(true);
  });

  it('should remove an attribute given a null property', () => {
    const { container, cleanup } = createTestContainer();
    cleanups.push(cleanup);
    const renderer = createDomRenderer(container);
    const doc = loadProgram(
      program({
        app: 'Attr',
        state: { title: 'first' },
        view: node('row', { title: prop.ident('title') }),
      })
    );
    const { tree, patches } = materialize(doc, doc.initialState);
    renderer.mount(tree, patches);
    expect(renderer.elementFor(0)?.getAttribute('title')).toBe('first');

    renderer.apply(
      [{ op: 'set-prop', ref: 0, name: 'title', value: NULL }],
      tree
    );

    expect(renderer.elementFor(0)?.hasAttribute('title')).toBe(false);
  });

  it('should ignore a patch for an unknown node with a warning', () => {
    const { container, cleanup } = createTestContainer();
    cleanups.push(cleanup);
    const renderer = createDomRenderer(container);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    renderer.apply([{ op: 'set-visible', ref: 7, visible: false }], {
      nodes: [],
    });

    expect(warn).toHaveBeenCalledWith(
      '[prism]',
      'Patch for unknown node 7 ignored'
    );
    warn.mockRestore();
  });

  it('should stop delivering events after destroy', () => {
    const { container, cleanup } = createTestContainer();
    cleanups.push(cleanup);
    const onEvent = vi.fn();
    const renderer = createDomRenderer(container, { onEvent });
    createRuntime(counterProgram(), { renderer });
    const button = renderer.elementFor(2);
    if (!button) throw new Error('expected a button');

    button.click();
    expect(onEvent).toHaveBeenCalledWith(2, { type: 'click' });

    renderer.destroy();
    button.click();
    expect(onEvent).toHaveBeenCalledTimes(1);
    expect(container.childNodes).toHaveLength(0);
  });
});
