import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryStore } from '../in-memory.store.js';

interface Note {
  text: string;
}

describe('InMemoryStore', () => {
  let store: InMemoryStore<Note>;

  beforeEach(() => {
    store = new InMemoryStore<Note>('Note');
  });

  it('assigns sequential ids starting at 1', () => {
    const first = store.upsert(undefined, { text: 'a' });
    const second = store.upsert(undefined, { text: 'b' });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(store.size).toBe(2);
  });

  it('returns records in insertion order', () => {
    store.upsert(undefined, { text: 'a' });
    store.upsert(undefined, { text: 'b' });
    store.upsert(undefined, { text: 'c' });

    expect(store.findAll().map((note) => note.text)).toEqual(['a', 'b', 'c']);
  });

  it('replaces a record under an existing id', () => {
    store.upsert(undefined, { text: 'a' });
    const replaced = store.upsert(1, { text: 'z' });

    expect(replaced).toEqual({ text: 'z', id: 1 });
    expect(store.findById(1)).toEqual({ text: 'z', id: 1 });
    expect(store.size).toBe(1);
  });

  it('never reuses an explicit id for later inserts', () => {
    store.upsert(5, { text: 'five' });
    const next = store.upsert(undefined, { text: 'next' });

    expect(next.id).toBe(6);
  });

  it('freezes stored records', () => {
    const note = store.upsert(undefined, { text: 'a' });

    expect(Object.isFrozen(note)).toBe(true);
  });

  it('does not keep a reference to the input object', () => {
    const input = { text: 'a' };
    store.upsert(undefined, input);
    input.text = 'changed';

    expect(store.findById(1)?.text).toBe('a');
  });

  it('freezes nested objects and arrays of stored records', () => {
    const tagged = new InMemoryStore<{ owner: { name: string }; tags: string[] }>('Tagged');
    const input = { owner: { name: 'Ana' }, tags: ['x'] };
    const record = tagged.upsert(undefined, input);

    expect(Object.isFrozen(record.owner)).toBe(true);
    expect(Object.isFrozen(record.tags)).toBe(true);
    expect(Object.isFrozen(input.owner)).toBe(false);
    expect(Object.isFrozen(input.tags)).toBe(false);

    input.tags.push('y');
    input.owner.name = 'Bo';
    expect(tagged.findById(1)).toEqual({ owner: { name: 'Ana' }, tags: ['x'], id: 1 });
  });

  it('deletes records without reusing their ids', () => {
    store.upsert(undefined, { text: 'a' });
    const removed = store.delete(1);
    const next = store.upsert(undefined, { text: 'b' });

    expect(removed?.text).toBe('a');
    expect(store.has(1)).toBe(false);
    expect(next.id).toBe(2);
  });

  it('returns undefined when deleting a missing id', () => {
    expect(store.delete(42)).toBeUndefined();
  });

  it('restarts the id sequence on clear', () => {
    store.upsert(undefined, { text: 'a' });
    store.clear();

    expect(store.size).toBe(0);
    expect(store.upsert(undefined, { text: 'b' }).id).toBe(1);
  });
});
