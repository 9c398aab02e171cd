/**
 * Cartridge - binds a scene to the host's frame loop
 *
 * The host calls init() once, then update() and draw() once per frame in
 * that order. The cartridge forwards each call to the current scene.
 *
 * @example
 * const cart = new Cartridge(createScene({ name: 'title' }));
 * host.run(cart.callbacks());
 *
 * // later, from a component
 * cart.changeScene(levelScene);
 */

import { changeScene } from './core/scene';
import type { Scene } from './core/scene';

/**
 * Host services consumed by game components. The library itself never
 * calls these.
 */
export interface HostApi {
    /** Whether a button is held this frame */
    isPressed(button: number): boolean;

    /** Fill the rectangle spanning (x0, y0)-(x1, y1) */
    fillRect(x0: number, y0: number, x1: number, y1: number, color: number): void;
}

/** Callbacks the host invokes */
export interface FrameCallbacks {
    init(): void;
    update(): void;
    draw(): void;
}

type CartridgeAction = 'init' | 'update' | 'draw' | 'changeScene';

export class Cartridge {
    private current: Scene;

    constructor(scene: Scene) {
        this.current = scene;
    }

    /** The scene receiving frame calls */
    get scene(): Scene {
        return this.current;
    }

    /**
     * Load the current scene.
     */
    init(): void {
        this.run('init', () => this.current.onLoad());
    }

    update(): void {
        this.run('update', () => this.current.update());
    }

    draw(): void {
        this.run('draw', () => this.current.draw());
    }

    /**
     * Swap to `next` with {@link changeScene}. `next` becomes current once
     * it has loaded; a fault while swapping leaves the current scene bound.
     */
    changeScene(next: Scene): Scene {
        this.run('changeScene', () => {
            this.current = changeScene(this.current, next);
        });
        return this.current;
    }

    /**
     * Bound callbacks to hand to the host.
     */
    callbacks(): FrameCallbacks {
        return {
            init: () => this.init(),
            update: () => this.update(),
            draw: () => this.draw()
        };
    }

    private run(action: CartridgeAction, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            console.error(`[Cartridge] Error during '${action}' of scene "${this.current.name}":`, error);
            throw error;
        }
    }
}
