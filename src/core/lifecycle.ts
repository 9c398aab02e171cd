/**
 * Lifecycle flags shared by entities and components.
 */

/**
 * Result of attaching a component to an entity or an entity to a scene.
 * - added: appended to the owner's collection
 * - invalid-kind: the value was missing or of the wrong kind
 * - duplicate-name: the owner already holds a member with that name
 * - already-attached: the value still belongs to another owner
 */
export type AttachResult = 'added' | 'invalid-kind' | 'duplicate-name' | 'already-attached';

/**
 * Base for anything an owner updates and draws.
 */
export abstract class LifecycleObject {
    /** Skipped by its owner's update/draw when false */
    active: boolean = true;

    /** Removed by its owner's next update sweep when true */
    pendingRemoval: boolean = false;

    setActive(state: boolean): void {
        this.active = state;
    }

    setPendingRemoval(state: boolean): void {
        this.pendingRemoval = state;
    }
}

/**
 * Short description of a rejected value for warnings.
 */
export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value !== 'object') return typeof value;
    if ('kind' in value && typeof value.kind === 'string') return value.kind;
    return value.constructor?.name ?? 'object';
}
