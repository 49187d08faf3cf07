/**
 * Scope Arena
 *
 * Manages variable scopes for one render call. Frames live in a flat array
 * and refer to their parent by index, so macros can hold on to the frame
 * they were defined in without owning it.
 */

import type { Value, ValueMap } from '../runtime/values';

/**
 * One scope: its own bindings plus the index of the enclosing frame
 */
export interface Frame {
  readonly parent: number | null;
  readonly vars: Map<string, Value>;
}

/**
 * Arena of scope frames addressed by index.
 *
 * @example
 * ```typescript
 * const arena = new ScopeArena();
 * const root = arena.createFrame(null, { user: 'Ada' });
 * const loop = arena.createFrame(root);
 * arena.set(loop, 'item', 1);
 * arena.lookup(loop, 'user'); // 'Ada' (from the parent frame)
 * arena.has(root, 'item'); // false (bindings stay local)
 * ```
 */
export class ScopeArena {
  private frames: Frame[] = [];

  /**
   * Add a new frame and return its index.
   * @param parent - Index of the enclosing frame, or null for a root frame
   * @param vars - Initial bindings
   */
  createFrame(parent: number | null, vars: ValueMap = {}): number {
    if (parent !== null) {
      this.getFrame(parent);
    }
    this.frames.push({ parent, vars: new Map(Object.entries(vars)) });
    return this.frames.length - 1;
  }

  getFrame(index: number): Frame {
    const frame = this.frames[index];
    if (!frame) {
      throw new RangeError(`Scope frame ${index} does not exist`);
    }
    return frame;
  }

  /**
   * Find the index of the nearest frame binding `name`, walking parents.
   * @returns The frame index, or null when no frame binds the name
   */
  resolve(index: number, name: string): number | null {
    let current: number | null = index;
    while (current !== null) {
      const frame = this.getFrame(current);
      if (frame.vars.has(name)) {
        return current;
      }
      current = frame.parent;
    }
    return null;
  }

  /**
   * Whether `name` is bound in the frame or any of its parents
   */
  has(index: number, name: string): boolean {
    return this.resolve(index, name) !== null;
  }

  /**
   * Look up a binding, walking parents. Unbound names yield undefined.
   */
  lookup(index: number, name: string): Value {
    const owner = this.resolve(index, name);
    return owner === null ? undefined : this.getFrame(owner).vars.get(name);
  }

  /**
   * Bind a name in the given frame only (never in a parent)
   */
  set(index: number, name: string, value: Value): void {
    this.getFrame(index).vars.set(name, value);
  }

  /**
   * Bindings made directly in a frame, in insertion order
   */
  ownBindings(index: number): [string, Value][] {
    return [...this.getFrame(index).vars.entries()];
  }

  /**
   * Every binding visible from a frame, nearest binding first in precedence.
   * The walk stops before `stop` (exclusive) when given.
   */
  visible(index: number, stop: number | null = null): ValueMap {
    const result: ValueMap = {};
    let current: number | null = index;
    while (current !== null && current !== stop) {
      const frame = this.getFrame(current);
      for (const [name, value] of frame.vars) {
        if (!Object.prototype.hasOwnProperty.call(result, name)) {
          result[name] = value;
        }
      }
      current = frame.parent;
    }
    return result;
  }

  /**
   * Get the number of frames created so far.
   */
  size(): number {
    return this.frames.length;
  }
}
