/**
 * Factories
 *
 * The only sanctioned way to create entities, components and scenes.
 * Each call composes the kind's frozen prototype and the caller's
 * definition into a fresh settings record, so instances never share
 * nested state with the prototype, the definition or each other.
 */

import { compose } from './compose';
import { Component } from './component';
import type { ComponentDefinition, ComponentSettings } from './component';
import { Entity } from './entity';
import type { EntityDefinition, EntitySettings } from './entity';
import { Scene } from './scene';
import type { SceneDefinition, SceneSettings } from './scene';

/**
 * Options for a factory.
 */
export interface FactoryOptions {
    /**
     * Prefix of generated entity names.
     * @default 'entity_'
     */
    entityPrefix?: string;

    /**
     * Prefix of generated component names.
     * @default 'component_'
     */
    componentPrefix?: string;

    /**
     * Prefix of generated scene names.
     * @default 'scene_'
     */
    scenePrefix?: string;
}

export interface FactoryCounts {
    entities: number;
    components: number;
    scenes: number;
}

/**
 * Keys a definition may not set; they belong to the owning container.
 */
export const RESERVED_KEYS: readonly string[] = ['kind', 'index', 'owner', 'scene', 'pendingRemoval', 'state'];

export const baseComponent: Readonly<ComponentSettings> = Object.freeze({
    active: true,
    data: Object.freeze({})
});

export const baseEntity: Readonly<EntitySettings> = Object.freeze({
    active: true,
    data: Object.freeze({})
});

export const baseScene: Readonly<SceneSettings> = Object.freeze({
    data: Object.freeze({})
});

/**
 * Creates instances and owns the counters used for default names.
 * Counters start at 0 and advance on every creation, named or not.
 */
export class Factory {
    private readonly entityPrefix: string;
    private readonly componentPrefix: string;
    private readonly scenePrefix: string;

    private entityCount: number = 0;
    private componentCount: number = 0;
    private sceneCount: number = 0;

    constructor(options: FactoryOptions = {}) {
        this.entityPrefix = options.entityPrefix ?? 'entity_';
        this.componentPrefix = options.componentPrefix ?? 'component_';
        this.scenePrefix = options.scenePrefix ?? 'scene_';
    }

    /**
     * Number of instances created since construction or the last reset().
     */
    get counts(): FactoryCounts {
        return {
            entities: this.entityCount,
            components: this.componentCount,
            scenes: this.sceneCount
        };
    }

    /**
     * Restart default naming from 0.
     */
    reset(): void {
        this.entityCount = 0;
        this.componentCount = 0;
        this.sceneCount = 0;
    }

    createComponent(): Component;
    createComponent<TData extends object>(definition: ComponentDefinition<TData>): Component<TData>;
    createComponent(definition: ComponentDefinition = {}): Component {
        const settings = compose<ComponentSettings>(
            { active: baseComponent.active, data: {} },
            [baseComponent, definition],
            RESERVED_KEYS
        );
        const name = settings.name ?? `${this.componentPrefix}${this.componentCount}`;
        this.componentCount++;
        return new Component(name, settings);
    }

    createEntity(): Entity;
    createEntity<TData extends object>(definition: EntityDefinition<TData>): Entity<TData>;
    createEntity(definition: EntityDefinition = {}): Entity {
        const settings = compose<EntitySettings>(
            { active: baseEntity.active, data: {} },
            [baseEntity, definition],
            RESERVED_KEYS
        );
        const name = settings.name ?? `${this.entityPrefix}${this.entityCount}`;
        this.entityCount++;
        return new Entity(name, settings);
    }

    createScene(): Scene;
    createScene<TData extends object>(definition: SceneDefinition<TData>): Scene<TData>;
    createScene(definition: SceneDefinition = {}): Scene {
        const settings = compose<SceneSettings>({ data: {} }, [baseScene, definition], RESERVED_KEYS);
        const name = settings.name ?? `${this.scenePrefix}${this.sceneCount}`;
        this.sceneCount++;
        return new Scene(name, settings);
    }
}

/** Factory behind the module-level create functions */
export const defaultFactory = new Factory();

export function createComponent(): Component;
export function createComponent<TData extends object>(definition: ComponentDefinition<TData>): Component<TData>;
export function createComponent(definition: ComponentDefinition = {}): Component {
    return defaultFactory.createComponent(definition);
}

export function createEntity(): Entity;
export function createEntity<TData extends object>(definition: EntityDefinition<TData>): Entity<TData>;
export function createEntity(definition: EntityDefinition = {}): Entity {
    return defaultFactory.createEntity(definition);
}

export function createScene(): Scene;
export function createScene<TData extends object>(definition: SceneDefinition<TData>): Scene<TData>;
export function createScene(definition: SceneDefinition = {}): Scene {
    return defaultFactory.createScene(definition);
}

/**
 * Restart default naming on the default factory.
 */
export function resetCounters(): void {
    defaultFactory.reset();
}
