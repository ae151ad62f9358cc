/**
 * Element fixtures: types with distinct move/copy/destroy capabilities,
 * plus a ledger that records every construction and destruction.
 */

import type { CopyTraits, MoveTraits } from "../../src/slice/traits.js";

export class Ledger {
  readonly constructed: number[] = [];
  readonly destroyed: number[] = [];

  timesDestroyed(id: number): number {
    return this.destroyed.filter((d) => d === id).length;
  }
}

export class Tracked {
  constructor(readonly id: number) {}
}

export class ConstructionFailure extends Error {
  constructor(readonly id: number) {
    super(`cannot construct element ${id}`);
    this.name = "ConstructionFailure";
  }
}

/**
 * Builds Tracked elements from numeric ids, throwing for `failOn`.
 */
export function trackedTraits(
  ledger: Ledger,
  failOn?: number,
): CopyTraits<Tracked, number> {
  return {
    copy: (id) => {
      if (id === failOn) {
        throw new ConstructionFailure(id);
      }
      ledger.constructed.push(id);
      return new Tracked(id);
    },
    destroy: (element) => {
      ledger.destroyed.push(element.id);
    },
  };
}

export class OnlyMovable {
  constructor(public value: number) {}

  take(): OnlyMovable {
    const moved = new OnlyMovable(this.value);
    this.value = 0;
    return moved;
  }
}

export const onlyMovableTraits: MoveTraits<OnlyMovable> = {
  move: (source) => source.take(),
};

export class OnlyCopyable {
  constructor(readonly value: number) {}

  clone(): OnlyCopyable {
    return new OnlyCopyable(this.value);
  }
}

export const onlyCopyableTraits: CopyTraits<OnlyCopyable> = {
  copy: (source) => source.clone(),
};
