/**
 * cart-ecs - entity/component/scene helpers for fantasy-console games
 *
 * Features:
 * - Uniform init/update/draw lifecycle for game objects
 * - Components attached to entities, entities grouped into scenes
 * - Attachment-order dispatch with deferred removal
 * - Factories that deep-copy prototypes so instances never share state
 */

// ============================================
// Composer
// ============================================
export { compose, assign, isPlainRecord } from './core';
export type { ExcludeKeys } from './core';

// ============================================
// Core ECS
// ============================================
export {
    LifecycleObject,
    OrderedCollection,
    Component,
    Entity,
    Scene,
    isComponent,
    isEntity,
    changeScene,
    describeValue
} from './core';

export type {
    AttachResult,
    CollectionMember,
    ComponentHooks,
    ComponentDefinition,
    ComponentSettings,
    EntityHooks,
    EntityDefinition,
    EntitySettings,
    SceneHooks,
    SceneDefinition,
    SceneSettings,
    SceneState
} from './core';

// ============================================
// Factories
// ============================================
export {
    Factory,
    defaultFactory,
    createComponent,
    createEntity,
    createScene,
    resetCounters,
    baseComponent,
    baseEntity,
    baseScene,
    RESERVED_KEYS
} from './core';

export type { FactoryOptions, FactoryCounts } from './core';

// ============================================
// Host binding
// ============================================
export { Cartridge } from './cartridge';
export type { HostApi, FrameCallbacks } from './cartridge';
