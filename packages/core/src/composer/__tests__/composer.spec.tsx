import { CompositionError, ReactivityError } from 'tessel-shared';
import { Composer } from '../composer';
import type { CompositionNode } from '../node';
import { useCell, useEffect, useRef } from '../hooks';
import { batch, cell } from '../../state/cell';
import type { StateCell } from '../../state/cell';
import { HtmlRenderer } from '../../renderers/html-renderer';
import { createElement, Fragment } from '../../jsx/jsx-runtime';

function html(composer: Composer): string {
  return composer.renderTree(new HtmlRenderer()).join('');
}

function rootChildren(composer: Composer): CompositionNode[] {
  const root = composer.getRoot();
  if (!root) throw new Error('composer has no root');
  return composer.getChildren(root.id);
}

function firstChild(composer: Composer, node: CompositionNode): CompositionNode {
  const [child] = composer.getChildren(node.id);
  if (!child) throw new Error(`node ${node.id} has no children`);
  return child;
}

describe('Composer', () => {
  describe('element walking', () => {
    it('composes host elements, text and numbers', () => {
      const composer = new Composer();
      composer.compose(
        <div className="box">
          <span>Hi</span>
          {' '}
          {3}
        </div>,
      );

      expect(html(composer)).toBe('<div class="box"><span>Hi</span> 3</div>');
    });

    it('treats fragments and components as transparent', () => {
      const Pair = ({ left, right }: { left: string; right: string }) => (
        <>
          <b>{left}</b>
          <i>{right}</i>
        </>
      );
      const composer = new Composer();
      composer.compose(<p><Pair left="a" right="b" /></p>);

      expect(html(composer)).toBe('<p><b>a</b><i>b</i></p>');
    });

    it('renders nothing for null, undefined and booleans', () => {
      const composer = new Composer();
      composer.compose(<ul>{null}{undefined}{false}{true}<li>x</li></ul>);

      expect(html(composer)).toBe('<ul><li>x</li></ul>');
    });

    it('builds the same tree through createElement', () => {
      const Label = ({ text }: { text: string }) => createElement('span', null, text);
      const composer = new Composer();
      composer.compose(createElement(Fragment, null, createElement(Label, { text: 'one' }), 'two'));

      expect(html(composer)).toBe('<span>one</span>two');
    });

    it('reports node kinds and parents', () => {
      const App = () => <main>text</main>;
      const composer = new Composer();
      composer.compose(<App />);

      const [app] = rootChildren(composer);
      if (!app) throw new Error('missing app');
      expect(app.kind).toBe('component');
      const main = firstChild(composer, app);
      expect(main.kind).toBe('host');
      expect(main.parent).toBe(app.id);
      expect(firstChild(composer, main).kind).toBe('text');
      expect(composer.nodeCount).toBe(4);
    });
  });

  describe('recomposition', () => {
    it('reruns only components whose cells changed', () => {
      const count = cell(0);
      const Label = vi.fn(() => <b>{count.value}</b>);
      const Static = vi.fn(() => <i>static</i>);
      const App = () => (
        <div>
          <Label />
          <Static />
        </div>
      );

      const composer = new Composer();
      composer.compose(<App />);
      expect(composer.stats.invoked).toBe(3);

      count.set(1);
      composer.recompose();

      expect(composer.stats.invoked).toBe(1);
      expect(composer.stats.skipped).toBe(2);
      expect(Label).toHaveBeenCalledTimes(2);
      expect(Static).toHaveBeenCalledTimes(1);
      expect(html(composer)).toBe('<div><b>1</b><i>static</i></div>');
    });

    it('skips unchanged props without rerunning effects and keeps nodes', () => {
      const effect = vi.fn();
      const Child = ({ label }: { label: string }) => {
        useEffect(() => {
          effect(label);
        }, [label]);
        return <span>{label}</span>;
      };

      const composer = new Composer();
      composer.compose(<Child label="a" />);
      const [before] = rootChildren(composer);

      composer.compose(<Child label="a" />);
      const [after] = rootChildren(composer);

      expect(composer.stats.invoked).toBe(0);
      expect(composer.stats.skipped).toBe(1);
      expect(effect).toHaveBeenCalledTimes(1);
      expect(after).toBe(before);
    });

    it('reruns a component when its props change', () => {
      const Child = vi.fn(({ label }: { label: string }) => <span>{label}</span>);
      const composer = new Composer();

      composer.compose(<Child label="a" />);
      composer.compose(<Child label="b" />);

      expect(Child).toHaveBeenCalledTimes(2);
      expect(html(composer)).toBe('<span>b</span>');
    });

    it('moves keyed children instead of recreating them', () => {
      const Item = ({ id }: { id: string }) => <li>{id}</li>;
      const List = ({ ids }: { ids: string[] }) => (
        <ul>
          {ids.map((id) => (
            <Item key={id} id={id} />
          ))}
        </ul>
      );

      const composer = new Composer();
      composer.compose(<List ids={['a', 'b', 'c', 'd', 'e']} />);
      const [list] = rootChildren(composer);
      if (!list) throw new Error('missing list');
      const ul = firstChild(composer, list);
      const before = composer.getChildren(ul.id);

      composer.compose(<List ids={['e', 'd', 'c', 'b', 'a']} />);
      const after = composer.getChildren(ul.id);

      expect(after.map((node) => node.key)).toEqual(['k:e', 'k:d', 'k:c', 'k:b', 'k:a']);
      after.forEach((node, index) => {
        expect(node).toBe(before[4 - index]);
      });
      expect(composer.stats.created).toBe(0);
      expect(composer.stats.disposed).toBe(0);
      expect(composer.stats.skipped).toBe(5);
      expect(html(composer)).toBe('<ul><li>e</li><li>d</li><li>c</li><li>b</li><li>a</li></ul>');
    });

    it('keeps every sibling that shares a key and tears each one down', () => {
      const cleanup = vi.fn();
      const Item = ({ label }: { label: string }) => {
        useEffect(() => cleanup, []);
        return <li>{label}</li>;
      };
      const twins = (
        <ul>
          <Item key="a" label="one" />
          <Item key="a" label="two" />
        </ul>
      );

      const composer = new Composer();
      composer.compose(twins);
      const [ul] = rootChildren(composer);
      if (!ul) throw new Error('missing list');
      const before = composer.getChildren(ul.id);

      composer.compose(twins);
      const after = composer.getChildren(ul.id);

      expect(after).toHaveLength(2);
      expect(after[0]).toBe(before[0]);
      expect(after[1]).toBe(before[1]);
      expect(composer.stats.created).toBe(0);
      expect(html(composer)).toBe('<ul><li>one</li><li>two</li></ul>');

      composer.compose(<ul />);

      expect(cleanup).toHaveBeenCalledTimes(2);
      expect(composer.nodeCount).toBe(2);
      expect(html(composer)).toBe('<ul></ul>');
    });

    it('matches unkeyed siblings by occurrence among the same type', () => {
      const composer = new Composer();
      composer.compose(<div><p>1</p><span>x</span><p>2</p></div>);
      const [div] = rootChildren(composer);
      if (!div) throw new Error('missing div');
      const before = composer.getChildren(div.id);

      composer.compose(<div><span>x</span><p>1</p><p>2</p></div>);
      const after = composer.getChildren(div.id);

      expect(after.map((node) => node.key)).toEqual(['i:0', 'i:0', 'i:1']);
      expect(after[0]).toBe(before[1]);
      expect(after[1]).toBe(before[0]);
      expect(after[2]).toBe(before[2]);
    });
  });

  describe('teardown', () => {
    it('runs cleanups child before parent and frees the nodes', () => {
      const order: string[] = [];
      const Leaf = ({ name }: { name: string }) => {
        useEffect(() => () => {
          order.push(`cleanup:${name}`);
        }, []);
        return <span>{name}</span>;
      };
      const Branch = () => {
        useEffect(() => () => {
          order.push('cleanup:branch');
        }, []);
        return (
          <div>
            <Leaf name="x" />
            <Leaf name="y" />
          </div>
        );
      };
      const App = ({ show }: { show: boolean }) => <main>{show ? <Branch /> : null}</main>;

      const composer = new Composer();
      composer.compose(<App show />);
      expect(composer.nodeCount).toBe(11);

      composer.compose(<App show={false} />);

      expect(order).toEqual(['cleanup:x', 'cleanup:y', 'cleanup:branch']);
      expect(composer.stats.disposed).toBe(8);
      expect(composer.nodeCount).toBe(3);
      expect(html(composer)).toBe('<main></main>');
    });

    it('drops writes to cells of a destroyed node', () => {
      const captured: { cell?: StateCell<number> } = {};
      const Holder = () => {
        const value = useCell(5);
        captured.cell = value;
        return <span>{value.value}</span>;
      };
      const App = ({ show }: { show: boolean }) => (show ? <Holder /> : null);

      const composer = new Composer();
      composer.compose(<App show />);
      composer.compose(<App show={false} />);

      captured.cell?.set(6);

      expect(captured.cell?.disposed).toBe(true);
      expect(captured.cell?.peek()).toBe(5);
    });

    it('unmounts everything on dispose', () => {
      const cleanup = vi.fn();
      const Mounted = () => {
        useEffect(() => cleanup, []);
        return <p>here</p>;
      };

      const composer = new Composer();
      composer.compose(<Mounted />);
      composer.dispose();

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(composer.nodeCount).toBe(0);
      expect(composer.disposed).toBe(true);
      expect(() => composer.compose(<Mounted />)).toThrow('Composer has been disposed');
    });
  });

  describe('composition errors', () => {
    it('keeps the previous subtree and reports to the handler', () => {
      const shouldThrow = cell(false);
      const sibling = cell('s1');
      const Fragile = () => {
        if (shouldThrow.value) throw new Error('boom');
        return <p>ok</p>;
      };
      const Sibling = () => <em>{sibling.value}</em>;
      const errors: CompositionError[] = [];

      const composer = new Composer({ onError: (error) => errors.push(error) });
      composer.compose(
        <section>
          <Fragile />
          <Sibling />
        </section>,
      );

      batch(() => {
        shouldThrow.set(true);
        sibling.set('s2');
      });
      composer.recompose();

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(CompositionError);
      expect(errors[0]?.code).toBe('COMPOSITION_BODY');
      expect(errors[0]?.component).toBe('Fragile');
      expect(errors[0]?.cause).toBeInstanceOf(Error);
      expect(html(composer)).toBe('<section><p>ok</p><em>s2</em></section>');

      shouldThrow.set(false);
      composer.recompose();
      expect(errors).toHaveLength(1);
    });

    it('reverts cells and effects created by a failed first run', () => {
      const effect = vi.fn();
      const captured: { cell?: StateCell<string> } = {};
      const Broken = () => {
        captured.cell = useCell('draft');
        useEffect(effect);
        throw new Error('not yet');
      };
      const errors: CompositionError[] = [];

      const composer = new Composer({ onError: (error) => errors.push(error) });
      composer.compose(<Broken />);

      expect(errors).toHaveLength(1);
      expect(effect).not.toHaveBeenCalled();
      expect(captured.cell?.disposed).toBe(true);
      expect(html(composer)).toBe('');
    });

    it('rejects hooks called in a different order', () => {
      const flag = cell(true);
      const Shifty = () => {
        if (flag.value) {
          useCell(1);
        }
        useRef(0);
        return null;
      };
      const errors: CompositionError[] = [];
      const composer = new Composer({ onError: (error) => errors.push(error) });

      composer.compose(<Shifty />);
      flag.set(false);
      composer.recompose();

      expect(errors).toHaveLength(1);
      expect(errors[0]?.code).toBe('COMPOSITION_HOOK_ORDER');
    });

    it('rejects a run with fewer hooks than the last one', () => {
      const flag = cell(true);
      const Shrinking = () => {
        useRef(0);
        if (flag.value) {
          useRef(1);
        }
        return null;
      };
      const errors: CompositionError[] = [];
      const composer = new Composer({ onError: (error) => errors.push(error) });

      composer.compose(<Shrinking />);
      flag.set(false);
      composer.recompose();

      expect(errors.map((error) => error.code)).toEqual(['COMPOSITION_HOOK_ORDER']);
    });

    it('rejects a nested pass started from a body', () => {
      const errors: CompositionError[] = [];
      const composer = new Composer({ onError: (error) => errors.push(error) });
      const Nested = () => {
        composer.recompose();
        return null;
      };

      composer.compose(<Nested />);

      expect(errors[0]?.cause).toBeInstanceOf(ReactivityError);
    });
  });

  describe('scheduling', () => {
    it('asks the attached scheduler for a pass when a read cell changes', () => {
      const scheduler = { schedule: vi.fn() };
      const value = cell('a');
      const Reader = () => <span>{value.value}</span>;

      const composer = new Composer({ scheduler });
      composer.compose(<Reader />);
      value.set('b');

      expect(scheduler.schedule).toHaveBeenCalledTimes(1);
      const [reader] = rootChildren(composer);
      expect(reader?.dirty).toBe(true);
    });

    it('stops tracking cells a body no longer reads', () => {
      const useFirst = cell(true);
      const first = cell(1);
      const second = cell(2);
      const Switch = () => <span>{useFirst.value ? first.value : second.value}</span>;

      const composer = new Composer();
      composer.compose(<Switch />);
      expect(first.subscriberCount).toBe(1);

      useFirst.set(false);
      composer.recompose();

      expect(first.subscriberCount).toBe(0);
      expect(second.subscriberCount).toBe(1);
    });
  });

  describe('ids', () => {
    it('counts ids per prefix', () => {
      const composer = new Composer();
      expect(composer.nextId('menu')).toBe('menu-1');
      expect(composer.nextId('menu')).toBe('menu-2');
      expect(composer.nextId('panel')).toBe('panel-1');
    });
  });
});
