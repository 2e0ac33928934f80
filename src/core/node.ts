/**
 * A labeled tree built from parsed XML.
 *
 * A node with no entries in `children` is a leaf whose `data` is its whole
 * value. A node with children is a container; non-empty `data` on a container
 * is mixed content. Every sequence in `children` is non-empty and in document
 * order.
 */
export interface XmlNode {
  data: string;
  children: Map<string, XmlNode[]>;
}

export function createNode(data = ''): XmlNode {
  return { data, children: new Map() };
}

export function addChild(parent: XmlNode, label: string, child: XmlNode): void {
  const siblings = parent.children.get(label);
  if (siblings) {
    siblings.push(child);
  } else {
    parent.children.set(label, [child]);
  }
}

export function hasChildren(node: XmlNode): boolean {
  return node.children.size > 0;
}

export function leaf(data: string): XmlNode {
  return createNode(data);
}

/**
 * Builds a container from a literal. A label mapped to an array produces one
 * child per element; empty arrays are skipped.
 */
export function element(children: Record<string, XmlNode | XmlNode[]>, data = ''): XmlNode {
  const node = createNode(data);
  for (const [label, value] of Object.entries(children)) {
    const list = Array.isArray(value) ? value : [value];
    for (const child of list) {
      addChild(node, label, child);
    }
  }
  return node;
}
