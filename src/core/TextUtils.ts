import type { AnyNode } from 'domhandler';
import { hasChildren, isText } from 'domhandler';

function collectText(node: AnyNode, out: string[]): void {
    if (isText(node)) {
        const t = node.data.trim();
        if (t) out.push(t);
        return;
    }
    if (hasChildren(node)) {
        for (const child of node.children) collectText(child, out);
    }
}

/**
 * Visible text of an element: every descendant text node trimmed, joined with
 * a single space, inner whitespace collapsed.
 */
export function visibleText(node: AnyNode): string {
    const parts: string[] = [];
    collectText(node, parts);
    return parts.join(' ').replace(/\s+/g, ' ').trim();
}
