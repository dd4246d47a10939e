import { DOMParser } from '@xmldom/xmldom';
import { fail, ok, type StyleResult } from '@docstyle/contracts';

const ELEMENT_NODE = 1;

/** Parses XML text, reporting malformed input as `XML_PARSE_ERROR`. */
export function parseXml(text: string, operation: string): StyleResult<Element> {
  const problems: string[] = [];
  let root: Element | null | undefined;
  try {
    const doc = new DOMParser({
      errorHandler: {
        warning: (message: string) => problems.push(message),
        error: (message: string) => problems.push(message),
        fatalError: (message: string) => problems.push(message),
      },
    }).parseFromString(text, 'text/xml');
    root = doc?.documentElement;
  } catch (error) {
    problems.push(error instanceof Error ? error.message : String(error));
  }

  if (!root || problems.length > 0) {
    return fail('XML_PARSE_ERROR', `Failed to parse XML content: ${problems[0] ?? 'no root element'}`, {
      operation,
    });
  }
  return ok(root);
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Child elements with the given local name, ignoring namespace prefixes. */
export function childElements(parent: Element, localName: string): Element[] {
  const result: Element[] = [];
  for (let child = parent.firstChild; child; child = child.nextSibling) {
    if (isElement(child) && child.localName === localName) result.push(child);
  }
  return result;
}

export function firstChild(parent: Element, localName: string): Element | undefined {
  return childElements(parent, localName)[0];
}

/** Attribute value, or `undefined` when the attribute is absent. */
export function attribute(element: Element, name: string): string | undefined {
  return element.hasAttribute(name) ? (element.getAttribute(name) ?? undefined) : undefined;
}

export function textOf(element: Element): string {
  return (element.textContent ?? '').trim();
}
