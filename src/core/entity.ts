/**
 * Entity
 *
 * A named container of components. Drives its components' init/update/draw
 * in attachment order and sweeps the ones flagged for removal at the end of
 * each update pass.
 */

import { Component, isComponent } from './component';
import { LifecycleObject, describeValue } from './lifecycle';
import type { AttachResult } from './lifecycle';
import { OrderedCollection } from './ordered-collection';
import type { Scene } from './scene';

/**
 * Entity-level hooks. Each runs after the matching component pass.
 * Inside a hook, `this` is the entity.
 */
export interface EntityHooks<TData extends object = object> {
    init?(this: Entity<TData>): void;
    update?(this: Entity<TData>): void;
    draw?(this: Entity<TData>): void;

    /** Called when a scene accepts the entity. Entities are not initialised on attach */
    onAddedToScene?(this: Entity<TData>, scene: Scene): void;
}

/**
 * User override passed to `createEntity`.
 */
export interface EntityDefinition<TData extends object = object> extends EntityHooks<TData> {
    /** Unique within the owning scene. Stamped by the factory when omitted */
    name?: string;

    /** @default true */
    active?: boolean;

    /** Per-instance state, deep-copied for every entity created */
    data?: TData;
}

export interface EntitySettings<TData extends object = object> extends EntityHooks<TData> {
    name?: string;
    active: boolean;
    data: TData;
}

export class Entity<TData extends object = object> extends LifecycleObject {
    readonly kind = 'entity' as const;

    readonly name: string;

    /** 1-based position in the scene's entities, 0 while detached */
    index: number = 0;

    data: TData;

    private readonly componentList: OrderedCollection<Component> = new OrderedCollection();

    private sceneRef: WeakRef<Scene> | undefined;

    private readonly hooks: EntityHooks<TData>;

    /**
     * Use `createEntity` instead.
     */
    constructor(name: string, settings: EntitySettings<TData>) {
        super();
        this.name = name;
        this.active = settings.active;
        this.data = settings.data;
        this.hooks = settings;
    }

    /** The scene holding this entity, held weakly */
    get scene(): Scene | undefined {
        return this.sceneRef?.deref();
    }

    setScene(scene: Scene | undefined): void {
        this.sceneRef = scene ? new WeakRef(scene) : undefined;
    }

    /** Components in attachment order */
    get components(): Component[] {
        return this.componentList.values();
    }

    get componentCount(): number {
        return this.componentList.size;
    }

    // ==========================================
    // Component API
    // ==========================================

    /**
     * Attach a component at the end of this entity's components, then run
     * its onAddedToEntity and init hooks.
     *
     * A component whose name is already taken is rejected; the held one is
     * left untouched. So is a component still attached to another entity.
     */
    addComponent(component: Component | null | undefined): AttachResult {
        if (!isComponent(component)) {
            console.warn(`[Entity] ${this.name}: addComponent expects a component, got ${describeValue(component)}`);
            return 'invalid-kind';
        }

        const owner = component.owner;
        if (owner && owner !== this) {
            console.warn(`[Entity] ${this.name}: component "${component.name}" is attached to entity "${owner.name}"`);
            return 'already-attached';
        }

        if (!this.componentList.add(component)) {
            console.warn(`[Entity] ${this.name}: component "${component.name}" is already attached`);
            return 'duplicate-name';
        }

        component.setOwner(this);
        component.onAddedToEntity(this);
        component.init();
        return 'added';
    }

    /**
     * Flag a component for removal. It is dropped at the end of this
     * entity's next update.
     *
     * @returns false if no component has that name
     */
    removeComponent(name: string): boolean {
        const component = this.componentList.get(name);
        if (!component) return false;

        component.setPendingRemoval(true);
        return true;
    }

    getComponent(name: string): Component | undefined {
        return this.componentList.get(name);
    }

    hasComponent(name: string): boolean {
        return this.componentList.has(name);
    }

    // ==========================================
    // Lifecycle
    // ==========================================

    init(): void {
        this.componentList.forEach(component => component.init());
        this.hooks.init?.call(this);
    }

    update(): void {
        if (!this.active) return;

        this.componentList.forEachActive(component => component.update());
        this.hooks.update?.call(this);

        for (const removed of this.componentList.sweep()) {
            removed.setOwner(undefined);
            removed.index = 0;
            removed.setPendingRemoval(false);
        }
    }

    draw(): void {
        if (!this.active) return;

        this.componentList.forEachActive(component => component.draw());
        this.hooks.draw?.call(this);
    }

    onAddedToScene(scene: Scene): void {
        this.hooks.onAddedToScene?.call(this, scene);
    }
}

export function isEntity(value: unknown): value is Entity {
    return value instanceof Entity;
}
