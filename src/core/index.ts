/**
 * Core - entities, components, scenes and the composer that builds them
 */

export * from './compose';
export * from './lifecycle';
export * from './ordered-collection';
export * from './component';
export * from './entity';
export * from './scene';
export * from './factory';
