/**
 * Low-level helpers over the xmldom tree: child lookup, ordered insertion and
 * `w:`-attribute access.
 *
 * Internal: not exported from the package root.
 */

import { ELEMENT_NODE, WORDPROCESSINGML_NS } from './constants.js';

function isElement(node: Node | null): node is Element {
  return node != null && node.nodeType === ELEMENT_NODE;
}

export function childElements(parent: Element, name?: string): Element[] {
  const result: Element[] = [];
  for (let child = parent.firstChild; child; child = child.nextSibling) {
    if (isElement(child) && (name === undefined || child.nodeName === name)) {
      result.push(child);
    }
  }
  return result;
}

export function findChild(parent: Element | undefined, name: string): Element | undefined {
  if (!parent) return undefined;
  for (let child = parent.firstChild; child; child = child.nextSibling) {
    if (isElement(child) && child.nodeName === name) return child;
  }
  return undefined;
}

export function createElement(owner: Element, name: string): Element {
  const doc = owner.ownerDocument;
  if (!doc) {
    throw new Error(`Cannot create <${name}>: element is detached from a document`);
  }
  return doc.createElementNS(WORDPROCESSINGML_NS, name);
}

/**
 * Returns the `name` child of `parent`, creating it in schema position when missing.
 *
 * @param order - Schema order of the siblings; names outside the list are appended.
 */
export function ensureChild(parent: Element, name: string, order: readonly string[] = []): Element {
  const existing = findChild(parent, name);
  if (existing) return existing;

  const created = createElement(parent, name);
  const rank = order.indexOf(name);
  if (rank >= 0) {
    const before = childElements(parent).find((sibling) => {
      const siblingRank = order.indexOf(sibling.nodeName);
      return siblingRank > rank;
    });
    if (before) {
      parent.insertBefore(created, before);
      return created;
    }
  }
  parent.appendChild(created);
  return created;
}

/** Returns the property block (`w:pPr`, `w:rPr`, `w:tblPr`), creating it as the first child. */
export function ensurePropertiesBlock(parent: Element, name: string): Element {
  const existing = findChild(parent, name);
  if (existing) return existing;
  const created = createElement(parent, name);
  const first = childElements(parent)[0];
  if (first) {
    parent.insertBefore(created, first);
  } else {
    parent.appendChild(created);
  }
  return created;
}

export function removeChild(parent: Element | undefined, name: string): void {
  const child = findChild(parent, name);
  if (parent && child) parent.removeChild(child);
}

export function readAttr(element: Element | undefined, name: string): string | undefined {
  if (!element || !element.hasAttribute(name)) return undefined;
  return element.getAttribute(name) ?? undefined;
}

export function readNumberAttr(element: Element | undefined, name: string): number | undefined {
  const raw = readAttr(element, name);
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function writeAttr(element: Element, name: string, value: string | number): void {
  element.setAttributeNS(WORDPROCESSINGML_NS, name, String(value));
}

export function removeAttr(element: Element | undefined, name: string): void {
  if (element && element.hasAttribute(name)) element.removeAttribute(name);
}

/** `w:val` of a single-value child such as `<w:jc w:val="center"/>`. */
export function readChildVal(parent: Element | undefined, name: string): string | undefined {
  return readAttr(findChild(parent, name), 'w:val');
}

/**
 * Toggle properties (`w:b`, `w:i`, ...) are on when present, unless `w:val` turns them off.
 */
export function isToggleOn(parent: Element | undefined, name: string): boolean {
  const toggle = findChild(parent, name);
  if (!toggle) return false;
  const val = readAttr(toggle, 'w:val');
  return val === undefined || !['false', '0', 'off'].includes(val);
}
