import type { ChainNode, CosignerPeer } from './config';

export type Equals<T> = (a: T, b: T) => boolean;

/**
 * Elements of `candidate` with no equal element in `reference`, in `candidate` order.
 *
 * Add: `reconcile(existing, requested)` gives what is new.
 * Remove: `reconcile(requested, existing)` gives what survives.
 * Duplicates already in `candidate` are carried through.
 */
export function reconcile<T>(reference: readonly T[], candidate: readonly T[], equals: Equals<T>): T[] {
  return candidate.filter((c) => !reference.some((r) => equals(r, c)));
}

export const sameChainNode: Equals<ChainNode> = (a, b) => a.address === b.address;

export const sameCosignerPeer: Equals<CosignerPeer> = (a, b) =>
  a.shareId === b.shareId && a.address === b.address;
