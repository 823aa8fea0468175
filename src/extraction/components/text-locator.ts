import { type ComponentNode, childNodes } from './nodes'

/**
 * Every text value under `node`, depth-first, children in document order.
 * Layout heuristics downstream depend on this order.
 */
export function findAllTexts(node: ComponentNode): string[] {
  const texts: string[] = []
  collectTexts(node, texts)
  return texts
}

/**
 * First text value under `node`, or `undefined` when there is none
 */
export function findText(node: ComponentNode): string | undefined {
  if (node.kind === 'text') return node.text

  for (const child of childNodes(node)) {
    const text = findText(child)
    if (text !== undefined) return text
  }
  return undefined
}

function collectTexts(node: ComponentNode, out: string[]): void {
  if (node.kind === 'text') {
    out.push(node.text)
    return
  }

  for (const child of childNodes(node)) {
    collectTexts(child, out)
  }
}
