import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Factory } from './factory';
import type { Component } from './component';
import type { Entity } from './entity';

describe('Entity', () => {
  let factory: Factory;
  let calls: string[];

  function tracked(name: string): Component {
    return factory.createComponent({
      name,
      init() { calls.push(`init:${this.name}`); },
      update() { calls.push(`update:${this.name}`); },
      draw() { calls.push(`draw:${this.name}`); }
    });
  }

  beforeEach(() => {
    factory = new Factory();
    calls = [];
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('addComponent', () => {
    test('appends, sets owner and index, then runs onAddedToEntity and init', () => {
      const entity = factory.createEntity({ name: 'player' });
      const component = factory.createComponent({
        name: 'health',
        onAddedToEntity(owner) { calls.push(`added:${owner.name}`); },
        init() { calls.push(`init:${this.owner?.name}`); }
      });

      expect(entity.addComponent(component)).toBe('added');
      expect(component.owner).toBe(entity);
      expect(component.index).toBe(1);
      expect(calls).toEqual(['added:player', 'init:player']);
    });

    test('rejects a missing component', () => {
      const entity = factory.createEntity({ name: 'player' });

      expect(entity.addComponent(null)).toBe('invalid-kind');
      expect(entity.addComponent(undefined)).toBe('invalid-kind');
      expect(entity.componentCount).toBe(0);
      expect(console.warn).toHaveBeenCalledWith('[Entity] player: addComponent expects a component, got null');
    });

    test('rejects a duplicate name and keeps the attached component', () => {
      const entity = factory.createEntity({ name: 'player' });
      const first = tracked('mover');
      const second = tracked('mover');
      entity.addComponent(first);

      expect(entity.addComponent(second)).toBe('duplicate-name');
      expect(entity.getComponent('mover')).toBe(first);
      expect(entity.componentCount).toBe(1);
      expect(second.owner).toBeUndefined();
      expect(console.warn).toHaveBeenCalledWith('[Entity] player: component "mover" is already attached');
    });

    test('rejects a component still attached to another entity', () => {
      const first = factory.createEntity({ name: 'A' });
      const second = factory.createEntity({ name: 'B' });
      const shared = tracked('s');
      first.addComponent(tracked('x'));
      first.addComponent(shared);
      second.addComponent(tracked('y'));

      expect(second.addComponent(shared)).toBe('already-attached');
      expect(second.hasComponent('s')).toBe(false);
      expect(shared.owner).toBe(first);
      expect(shared.index).toBe(2);
      expect(console.warn).toHaveBeenCalledWith('[Entity] B: component "s" is attached to entity "A"');
    });

    test('a swept component can move to another entity', () => {
      const first = factory.createEntity({ name: 'A' });
      const second = factory.createEntity({ name: 'B' });
      const shared = tracked('s');
      first.addComponent(shared);
      second.addComponent(tracked('y'));

      first.removeComponent('s');
      first.update();

      expect(second.addComponent(shared)).toBe('added');
      expect(shared.owner).toBe(second);
      expect(shared.index).toBe(2);
      expect(first.hasComponent('s')).toBe(false);
    });
  });

  describe('getComponent', () => {
    test('returns undefined for a missing name', () => {
      const entity = factory.createEntity();
      expect(entity.getComponent('Missing')).toBeUndefined();
      expect(entity.hasComponent('Missing')).toBe(false);
    });
  });

  describe('lifecycle', () => {
    let entity: Entity;

    beforeEach(() => {
      entity = factory.createEntity({ name: 'player' });
      for (const name of ['a', 'b', 'c']) entity.addComponent(tracked(name));
      calls = [];
    });

    test('init visits components in attachment order', () => {
      entity.init();
      expect(calls).toEqual(['init:a', 'init:b', 'init:c']);
    });

    test('update and draw visit components in attachment order', () => {
      entity.update();
      entity.draw();
      expect(calls).toEqual(['update:a', 'update:b', 'update:c', 'draw:a', 'draw:b', 'draw:c']);
    });

    test('an empty entity updates and draws nothing', () => {
      const empty = factory.createEntity();
      empty.update();
      empty.draw();
      expect(empty.components).toEqual([]);
    });

    test('inactive components are skipped but stay attached', () => {
      const b = entity.getComponent('b');
      b?.setActive(false);

      entity.update();
      entity.draw();

      expect(calls).toEqual(['update:a', 'update:c', 'draw:a', 'draw:c']);
      expect(entity.getComponent('b')).toBe(b);
      expect(b?.index).toBe(2);
    });

    test('an inactive entity neither updates, draws nor sweeps', () => {
      entity.removeComponent('a');
      entity.setActive(false);

      entity.update();
      entity.draw();

      expect(calls).toEqual([]);
      expect(entity.hasComponent('a')).toBe(true);
      expect(entity.getComponent('a')?.pendingRemoval).toBe(true);
    });

    test('removal is deferred to the end of update and reindexes', () => {
      const a = entity.getComponent('a');

      expect(entity.removeComponent('a')).toBe(true);
      expect(entity.hasComponent('a')).toBe(true);

      entity.update();
      entity.draw();

      expect(calls).toEqual(['update:a', 'update:b', 'update:c', 'draw:b', 'draw:c']);
      expect(entity.components.map(c => [c.name, c.index])).toEqual([['b', 1], ['c', 2]]);
      expect(a?.owner).toBeUndefined();
      expect(a?.index).toBe(0);
      expect(a?.pendingRemoval).toBe(false);
    });

    test('a component flagged mid-update still gets its update that frame', () => {
      const killer = factory.createComponent({
        name: 'killer',
        update() {
          calls.push('update:killer');
          this.owner?.removeComponent('c');
        }
      });
      const fresh = factory.createEntity();
      fresh.addComponent(killer);
      fresh.addComponent(tracked('c'));
      calls = [];

      fresh.update();
      expect(calls).toEqual(['update:killer', 'update:c']);
      expect(fresh.hasComponent('c')).toBe(false);

      fresh.update();
      expect(calls).toEqual(['update:killer', 'update:c', 'update:killer']);
    });

    test('removeComponent returns false for an unknown name', () => {
      expect(entity.removeComponent('nope')).toBe(false);
    });

    test('entity hooks run after the component pass', () => {
      const owner = factory.createEntity({
        init() { calls.push('init:entity'); },
        update() { calls.push('update:entity'); },
        draw() { calls.push('draw:entity'); }
      });
      owner.addComponent(tracked('x'));
      calls = [];

      owner.init();
      owner.update();
      owner.draw();

      expect(calls).toEqual(['init:x', 'init:entity', 'update:x', 'update:entity', 'draw:x', 'draw:entity']);
    });

    test('a component can read an earlier sibling during init', () => {
      const owner = factory.createEntity();
      const transform = factory.createComponent({ name: 'transform', data: { x: 4 } });
      let seen: Component | undefined;
      const follower = factory.createComponent({
        name: 'follower',
        init() { seen = this.owner?.getComponent('transform'); }
      });

      owner.addComponent(transform);
      owner.addComponent(follower);

      expect(seen).toBe(transform);
    });
  });
});
