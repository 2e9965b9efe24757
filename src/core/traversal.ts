/**
 * Skeleton traversal
 *
 * Pre-order walks over the joint tree. Each walk is an explicit-stack
 * iterator; iterating the same traversal again starts from the root.
 */

import type { BvhJoint, BvhNode } from '../types';

export type ChildSelector<T> = (node: T) => readonly T[];

/**
 * Finite, restartable pre-order sequence: the node, then each child's
 * sequence in declaration order.
 */
export class PreOrderTraversal<T> implements Iterable<T> {
  constructor(
    private readonly root: T,
    private readonly childrenOf: ChildSelector<T>
  ) { }

  [Symbol.iterator](): Iterator<T> {
    const stack: T[] = [this.root];
    const childrenOf = this.childrenOf;

    return {
      next(): IteratorResult<T> {
        const node = stack.pop();
        if (node === undefined) {
          return { done: true, value: undefined };
        }

        // Pushed in reverse so the first child is visited next
        const children = childrenOf(node);
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push(children[i]);
        }
        return { done: false, value: node };
      },
    };
  }

  toArray(): T[] {
    return Array.from(this);
  }
}

/**
 * Channel-owning joints only. This order fixes the channel layout.
 */
export function traverseJoints(root: BvhJoint): PreOrderTraversal<BvhJoint> {
  return new PreOrderTraversal<BvhJoint>(root, joint => joint.children);
}

/**
 * Joints and End Sites. A joint's End Sites follow its child joints.
 */
export function traverseNodes(root: BvhJoint): PreOrderTraversal<BvhNode> {
  return new PreOrderTraversal<BvhNode>(root, node =>
    node.kind === 'joint' ? [...node.children, ...node.endSites] : []
  );
}

export function findJoint(root: BvhJoint, name: string): BvhJoint | undefined {
  for (const joint of traverseJoints(root)) {
    if (joint.name === name) {
      return joint;
    }
  }
  return undefined;
}

/**
 * Sum of channel counts over the pre-order joint traversal
 */
export function countChannels(root: BvhJoint): number {
  let count = 0;
  for (const joint of traverseJoints(root)) {
    count += joint.channels.length;
  }
  return count;
}
