import type { AstNode, AstNodeKind, NodeOfKind } from '../types/index.js';
import { children } from './node.js';

/**
 * Generic AST Visitor (pre-order)
 */
export function traverse(node: AstNode, visitor: (node: AstNode) => void): void {
    visitor(node);
    for (const child of children(node)) {
        traverse(child, visitor);
    }
}

/**
 * Pre-order iteration without recursion.
 */
export function* iterate(root: AstNode): Generator<AstNode> {
    const stack: AstNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        yield node;
        stack.push(...[...children(node)].reverse());
    }
}

/**
 * All nodes of one kind under `root`, in pre-order.
 */
export function findAll<K extends AstNodeKind>(root: AstNode, kind: K): NodeOfKind<K>[] {
    const found: NodeOfKind<K>[] = [];
    const matches = (node: AstNode): node is NodeOfKind<K> => node.kind === kind;
    traverse(root, (node) => {
        if (matches(node)) found.push(node);
    });
    return found;
}

export function countNodes(root: AstNode): number {
    let count = 0;
    traverse(root, () => { count++; });
    return count;
}
