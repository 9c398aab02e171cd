/**
 * Component
 *
 * A named unit of behaviour and data attached to exactly one entity.
 * Components are created through the factory, which deep-copies their
 * `data` out of the definition so no two components share nested state.
 */

import { LifecycleObject } from './lifecycle';
import type { Entity } from './entity';

/**
 * Lifecycle hooks a component definition may provide.
 * Inside a hook, `this` is the component.
 */
export interface ComponentHooks<TData extends object = object> {
    /** Called when attached to an entity and on every entity init */
    init?(this: Component<TData>): void;

    /** Called once per frame while the component and its entity are active */
    update?(this: Component<TData>): void;

    /** Called once per frame after update while active */
    draw?(this: Component<TData>): void;

    /** Called right after the owning entity accepts the component, before init */
    onAddedToEntity?(this: Component<TData>, entity: Entity): void;
}

/**
 * User override passed to `createComponent`.
 */
export interface ComponentDefinition<TData extends object = object> extends ComponentHooks<TData> {
    /** Unique within the owning entity. Stamped by the factory when omitted */
    name?: string;

    /** @default true */
    active?: boolean;

    /** Per-instance state, deep-copied for every component created */
    data?: TData;
}

/**
 * Fully resolved settings a component is constructed from.
 */
export interface ComponentSettings<TData extends object = object> extends ComponentHooks<TData> {
    name?: string;
    active: boolean;
    data: TData;
}

export class Component<TData extends object = object> extends LifecycleObject {
    readonly kind = 'component' as const;

    readonly name: string;

    /** 1-based position in the owner's components, 0 while detached */
    index: number = 0;

    data: TData;

    private ownerRef: WeakRef<Entity> | undefined;

    private readonly hooks: ComponentHooks<TData>;

    /**
     * Use `createComponent` instead; the factory resolves defaults and
     * copies the definition.
     */
    constructor(name: string, settings: ComponentSettings<TData>) {
        super();
        this.name = name;
        this.active = settings.active;
        this.data = settings.data;
        this.hooks = settings;
    }

    /**
     * The entity this component is attached to, if any.
     * Held weakly: a component never keeps its entity alive.
     */
    get owner(): Entity | undefined {
        return this.ownerRef?.deref();
    }

    setOwner(owner: Entity | undefined): void {
        this.ownerRef = owner ? new WeakRef(owner) : undefined;
    }

    init(): void {
        this.hooks.init?.call(this);
    }

    update(): void {
        this.hooks.update?.call(this);
    }

    draw(): void {
        this.hooks.draw?.call(this);
    }

    onAddedToEntity(entity: Entity): void {
        this.hooks.onAddedToEntity?.call(this, entity);
    }
}

export function isComponent(value: unknown): value is Component {
    return value instanceof Component;
}
