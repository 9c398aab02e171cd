/**
 * Scene
 *
 * A named container of entities, swapped as a unit.
 *
 * State machine: unloaded -> onLoad() -> active -> unload() -> unloaded
 */

import { Entity, isEntity } from './entity';
import { describeValue } from './lifecycle';
import type { AttachResult } from './lifecycle';
import { OrderedCollection } from './ordered-collection';

export type SceneState = 'unloaded' | 'active';

/**
 * Scene-level hooks. init/update/draw run after the matching entity pass;
 * onLoad runs before entities are re-initialised so it can add entities.
 */
export interface SceneHooks<TData extends object = object> {
    init?(this: Scene<TData>): void;
    update?(this: Scene<TData>): void;
    draw?(this: Scene<TData>): void;
    onLoad?(this: Scene<TData>): void;

    /** Teardown when the scene is swapped out. Nothing by default */
    unload?(this: Scene<TData>): void;
}

/**
 * User override passed to `createScene`.
 */
export interface SceneDefinition<TData extends object = object> extends SceneHooks<TData> {
    name?: string;
    data?: TData;
}

export interface SceneSettings<TData extends object = object> extends SceneHooks<TData> {
    name?: string;
    data: TData;
}

export class Scene<TData extends object = object> {
    readonly kind = 'scene' as const;

    readonly name: string;

    data: TData;

    private _state: SceneState = 'unloaded';

    private readonly entityList: OrderedCollection<Entity> = new OrderedCollection();

    private readonly hooks: SceneHooks<TData>;

    /**
     * Use `createScene` instead.
     */
    constructor(name: string, settings: SceneSettings<TData>) {
        this.name = name;
        this.data = settings.data;
        this.hooks = settings;
    }

    get state(): SceneState {
        return this._state;
    }

    /** Entities in attachment order */
    get entities(): Entity[] {
        return this.entityList.values();
    }

    get entityCount(): number {
        return this.entityList.size;
    }

    // ==========================================
    // Entity API
    // ==========================================

    /**
     * Append an entity and run its onAddedToScene hook. The entity is not
     * initialised here; init() and onLoad() do that.
     */
    addEntity(entity: Entity | null | undefined): AttachResult {
        if (!isEntity(entity)) {
            console.warn(`[Scene] ${this.name}: addEntity expects an entity, got ${describeValue(entity)}`);
            return 'invalid-kind';
        }

        const scene = entity.scene;
        if (scene && scene !== this) {
            console.warn(`[Scene] ${this.name}: entity "${entity.name}" belongs to scene "${scene.name}"`);
            return 'already-attached';
        }

        if (!this.entityList.add(entity)) {
            console.warn(`[Scene] ${this.name}: entity "${entity.name}" is already in the scene`);
            return 'duplicate-name';
        }

        entity.setScene(this);
        entity.onAddedToScene(this);
        return 'added';
    }

    /**
     * Flag an entity for removal at the end of the next update.
     *
     * @returns false if no entity has that name
     */
    removeEntity(name: string): boolean {
        const entity = this.entityList.get(name);
        if (!entity) return false;

        entity.setPendingRemoval(true);
        return true;
    }

    getEntity(name: string): Entity | undefined {
        return this.entityList.get(name);
    }

    hasEntity(name: string): boolean {
        return this.entityList.has(name);
    }

    // ==========================================
    // Lifecycle
    // ==========================================

    init(): void {
        this.entityList.forEach(entity => entity.init());
        this.hooks.init?.call(this);
    }

    update(): void {
        this.entityList.forEachActive(entity => entity.update());
        this.hooks.update?.call(this);

        for (const removed of this.entityList.sweep()) {
            removed.setScene(undefined);
            removed.index = 0;
            removed.setPendingRemoval(false);
        }
    }

    draw(): void {
        this.entityList.forEachActive(entity => entity.draw());
        this.hooks.draw?.call(this);
    }

    /**
     * Activate the scene and re-initialise every entity it holds.
     * May be called again each time the scene becomes current.
     */
    onLoad(): void {
        this._state = 'active';
        this.hooks.onLoad?.call(this);
        this.entityList.forEach(entity => entity.init());
    }

    unload(): void {
        this.hooks.unload?.call(this);
        this._state = 'unloaded';
    }
}

/**
 * Unload `current` and load `next`.
 *
 * A fault in `current.unload()` propagates and `next` is never loaded.
 *
 * @returns The scene that is now current
 */
export function changeScene<TScene extends Scene>(current: Scene, next: TScene): TScene {
    current.unload();
    next.onLoad();
    return next;
}
