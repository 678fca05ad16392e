import { describe, expect, it, vi } from 'vitest';
import { TreeContractError } from '../src/errors/index.js';
import { walkTree } from '../src/tree/walker.js';

interface MenuItem {
  name: string;
  items?: MenuItem[] | null;
}

const items = (item: MenuItem): MenuItem[] | null | undefined => item.items;

/**
 * a ─┬─ b ─┬─ d
 *    │     └─ e
 *    └─ c
 */
function sampleMenu(): MenuItem[] {
  return [
    {
      name: 'a',
      items: [
        { name: 'b', items: [{ name: 'd' }, { name: 'e', items: [] }] },
        { name: 'c', items: null },
      ],
    },
  ];
}

function record(menu: MenuItem[]): string[] {
  const events: string[] = [];
  walkTree(
    menu,
    items,
    (item, depth) => events.push(`pre ${item.name} ${depth}`),
    (item, depth) => events.push(`post ${item.name} ${depth}`)
  );
  return events;
}

describe('walkTree', () => {
  it('calls preVisit before and postVisit after each subtree', () => {
    expect(record(sampleMenu())).toEqual([
      'pre a 0',
      'pre b 1',
      'pre d 2',
      'post d 2',
      'pre e 2',
      'post e 2',
      'post b 1',
      'pre c 1',
      'post c 1',
      'post a 0',
    ]);
  });

  it('visits sibling roots in sequence order', () => {
    expect(record([{ name: 'x' }, { name: 'y', items: [{ name: 'z' }] }])).toEqual([
      'pre x 0',
      'post x 0',
      'pre y 0',
      'pre z 1',
      'post z 1',
      'post y 0',
    ]);
  });

  it('orders every parent around its first and last child', () => {
    const events = record(sampleMenu());
    const position = (event: string): number => events.indexOf(event);

    const check = (item: MenuItem, depth: number): void => {
      const children = item.items ?? [];
      const first = children[0];
      const last = children[children.length - 1];
      if (first && last) {
        expect(position(`pre ${item.name} ${depth}`)).toBeLessThan(position(`pre ${first.name} ${depth + 1}`));
        expect(position(`post ${last.name} ${depth + 1}`)).toBeLessThan(position(`post ${item.name} ${depth}`));
      }
      children.forEach((child) => check(child, depth + 1));
    };
    sampleMenu().forEach((item) => check(item, 0));
  });

  it('is a no-op for empty or absent input', () => {
    const getChildren = vi.fn(items);
    const preVisit = vi.fn();
    const postVisit = vi.fn();

    walkTree([], getChildren, preVisit, postVisit);
    walkTree(null, getChildren, preVisit, postVisit);
    walkTree(undefined, getChildren, preVisit, postVisit);

    expect(getChildren).not.toHaveBeenCalled();
    expect(preVisit).not.toHaveBeenCalled();
    expect(postVisit).not.toHaveBeenCalled();
  });

  it('accepts only a preVisit callback', () => {
    const names: string[] = [];

    walkTree(sampleMenu(), items, (item) => names.push(item.name));

    expect(names).toEqual(['a', 'b', 'd', 'e', 'c']);
  });

  it('accepts only a postVisit callback', () => {
    const names: string[] = [];

    walkTree(sampleMenu(), items, undefined, (item) => names.push(item.name));

    expect(names).toEqual(['d', 'e', 'b', 'c', 'a']);
  });

  it('reads each node’s children once', () => {
    const getChildren = vi.fn(items);

    walkTree(sampleMenu(), getChildren);

    expect(getChildren.mock.calls.map(([item]) => item.name)).toEqual(['a', 'b', 'd', 'e', 'c']);
  });

  it('walks nesting deeper than the native call stack', () => {
    const root: MenuItem = { name: '0' };
    let current = root;
    for (let level = 1; level < 50_000; level++) {
      const next: MenuItem = { name: String(level) };
      current.items = [next];
      current = next;
    }
    let visited = 0;
    let deepest = 0;

    walkTree([root], items, undefined, (_item, depth) => {
      visited++;
      deepest = Math.max(deepest, depth);
    });

    expect(visited).toBe(50_000);
    expect(deepest).toBe(49_999);
  });

  it('fails loudly on a missing children accessor', () => {
    expect(() => Reflect.apply(walkTree, undefined, [sampleMenu(), null])).toThrow(TreeContractError);
  });

  it('fails loudly on a callback that is not a function', () => {
    expect(() => Reflect.apply(walkTree, undefined, [sampleMenu(), items, 'pre'])).toThrow(
      'preVisit must be a function, received string'
    );
  });
});
