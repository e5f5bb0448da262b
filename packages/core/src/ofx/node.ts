/**
 * Minimal OFX element tree.
 *
 * Generators build nested records from these nodes; a single render pass
 * turns the tree into indented SGML lines. Field values are escaped at
 * render time.
 */

import { escapeMarkup } from '../utils/normalize.js';

/**
 * Leaf element: `<TAG>value</TAG>` on one line.
 */
export interface OfxField {
    readonly kind: 'field';
    readonly tag: string;
    readonly value: string;
}

/**
 * Aggregate element with children on their own lines.
 */
export interface OfxElement {
    readonly kind: 'element';
    readonly tag: string;
    readonly children: readonly OfxNode[];
}

export type OfxNode = OfxField | OfxElement;

const INDENT = '  ';

/**
 * Build a leaf field.
 */
export function field(tag: string, value: string): OfxField {
    return { kind: 'field', tag, value };
}

/**
 * Build an aggregate element. Null children are dropped, so optional
 * sections can be written inline.
 */
export function element(tag: string, children: ReadonlyArray<OfxNode | null>): OfxElement {
    return {
        kind: 'element',
        tag,
        children: children.filter((child): child is OfxNode => child !== null),
    };
}

/**
 * Render a node as lines, indented two spaces per nesting level.
 *
 * @param node - Root of the subtree
 * @param depth - Nesting level of `node` itself
 */
export function renderNode(node: OfxNode, depth = 0): string[] {
    const pad = INDENT.repeat(depth);
    if (node.kind === 'field') {
        return [`${pad}<${node.tag}>${escapeMarkup(node.value)}</${node.tag}>`];
    }

    const lines = [`${pad}<${node.tag}>`];
    for (const child of node.children) {
        lines.push(...renderNode(child, depth + 1));
    }
    lines.push(`${pad}</${node.tag}>`);
    return lines;
}
