import { describe, expect, it } from 'vitest';

import { ContextStore, originName } from '../src/frontend/context.js';
import { parseSource } from '../src/frontend/parser.js';

describe('context store', () => {
  it('allocates ids from 1 and looks them up', () => {
    const store = new ContextStore();
    const a = store.add({ kind: 'virtual', name: 'a.tern', text: '' });
    const b = store.add({ kind: 'file', path: '/src/b.tern', text: '' });
    expect([a.id, b.id]).toEqual([1, 2]);
    expect(store.get(2)).toBe(b);
    expect(store.get(3)).toBeUndefined();
    expect(store.size).toBe(2);
  });

  it('tombstones removed contexts without reusing their ids', () => {
    const store = new ContextStore();
    const a = store.add({ kind: 'virtual', name: 'a', text: '' });
    store.add({ kind: 'virtual', name: 'b', text: '' });
    expect(store.remove(a.id)).toBe(true);
    expect(store.remove(a.id)).toBe(false);
    expect(store.get(a.id)).toBeUndefined();
    expect(store.size).toBe(1);
    expect(store.nextContextId()).toBe(3);
  });

  it('counts local ids per context', () => {
    const store = new ContextStore();
    const a = store.add({ kind: 'virtual', name: 'a', text: '' });
    const b = store.add({ kind: 'virtual', name: 'b', text: '' });
    expect([a.nextLocalId(), a.nextLocalId(), b.nextLocalId()]).toEqual([1, 2, 1]);
  });

  it('names file and virtual origins', () => {
    expect(originName({ kind: 'file', path: 'lib/x.tern', text: '' })).toBe('lib/x.tern');
    expect(originName({ kind: 'virtual', name: '<repl>', text: '' })).toBe('<repl>');
  });

  it('releases the parser context once a source is parsed', () => {
    const store = new ContextStore();
    const res = parseSource({ kind: 'virtual', name: 'main', text: 'var a = 1;' }, {}, store);
    expect(res.ok).toBe(true);
    expect(store.size).toBe(0);
    expect(store.nextContextId()).toBe(2);
  });
});
