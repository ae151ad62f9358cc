/**
 * Element traits describe what an element type can do: how it is built from
 * a source value (move or copy) and whether it needs explicit teardown.
 *
 * A traits object must provide `move`, `copy`, or both. One that provides
 * neither is not an `ElementTraits` and is rejected by the compiler.
 */

import { InvalidArgumentError } from "./errors.js";

export type Destroy<T> = (value: T) => void;

interface DestroyCapability<T> {
  /**
   * Releases whatever the element holds. Absent for trivially destructible
   * types, in which case teardown does no per-element work.
   */
  destroy?: Destroy<T>;
}

export interface MoveTraits<T, S = T> extends DestroyCapability<T> {
  /** Builds an element by taking over `source`, leaving it moved-from. */
  move: (source: S) => T;
  copy?: (source: S) => T;
}

export interface CopyTraits<T, S = T> extends DestroyCapability<T> {
  move?: undefined;
  /** Builds an element from `source`, leaving it unchanged. */
  copy: (source: S) => T;
}

export type ElementTraits<T, S = T> = MoveTraits<T, S> | CopyTraits<T, S>;

export type ConstructionKind = "move" | "copy";

export interface ConstructionStrategy<T, S> {
  kind: ConstructionKind;
  construct: (source: S) => T;
}

export type IsTriviallyDestructible<Traits> = Traits extends {
  destroy: Destroy<never>;
}
  ? false
  : true;

/**
 * Move when the traits allow it, copy otherwise.
 */
export function selectStrategy<T, S>(
  traits: ElementTraits<T, S>,
): ConstructionStrategy<T, S> {
  const { move, copy } = traits;
  if (move) {
    return { kind: "move", construct: move };
  }
  if (copy) {
    return { kind: "copy", construct: copy };
  }
  // Only reachable from untyped callers.
  throw new InvalidArgumentError(
    "Element traits must provide a move or copy constructor",
  );
}

export function isTriviallyDestructible<T, S>(
  traits: ElementTraits<T, S>,
): boolean {
  return traits.destroy === undefined;
}

/**
 * Traits for values whose reference can simply be handed over: numbers,
 * strings, plain records, or objects the slice should take as-is.
 */
export function transferTraits<T>(destroy?: Destroy<T>): MoveTraits<T> {
  const move = (source: T): T => source;
  return destroy ? { move, destroy } : { move };
}

export function copyTraits<T, S = T>(
  copy: (source: S) => T,
  destroy?: Destroy<T>,
): CopyTraits<T, S> {
  return destroy ? { copy, destroy } : { copy };
}
