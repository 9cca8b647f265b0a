/**
 * @module xml
 * Minimal element tree over `maindoc.xml`, with typed attribute getters.
 *
 * Dependencies:
 * - @xmldom/xmldom: DOMParser for Node
 */

import { DOMParser } from '@xmldom/xmldom';
import { KraDocumentError } from './errors';

/** An element with its attributes and child elements in document order. */
export interface XmlElement {
  tagName: string;
  attributes: ReadonlyArray<readonly [name: string, value: string]>;
  children: XmlElement[];
}

const ELEMENT_NODE = 1;

/**
 * Parse an XML document into an element tree.
 * @returns The root element.
 * @throws {KraDocumentError} `invalid-xml` on any parser error.
 */
export function parseXml(text: string): XmlElement {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      error: (msg: string) => errors.push(msg),
      fatalError: (msg: string) => errors.push(msg),
    },
  });

  let root: Element | null;
  try {
    root = parser.parseFromString(text, 'text/xml').documentElement;
  } catch (err) {
    throw new KraDocumentError('invalid-xml', 'maindoc.xml is not well-formed XML', { cause: err });
  }

  if (errors.length > 0 || !root) {
    const detail = errors.length > 0 ? `: ${errors[0]}` : '';
    throw new KraDocumentError('invalid-xml', `maindoc.xml is not well-formed XML${detail}`);
  }
  return toXmlElement(root);
}

/** First child element with the given tag name. */
export function findChild(element: XmlElement, tagName: string): XmlElement | undefined {
  return element.children.find((child) => child.tagName === tagName);
}

/** Raw attribute value, or undefined when absent. */
export function readAttribute(element: XmlElement, name: string): string | undefined {
  for (const [key, value] of element.attributes) {
    if (key === name) return value;
  }
  return undefined;
}

/** String attribute with a fallback for a missing attribute. */
export function readString(element: XmlElement, name: string, fallback: string): string {
  return readAttribute(element, name) ?? fallback;
}

/** Integer attribute with a fallback for a missing or non-numeric attribute. */
export function readInt(element: XmlElement, name: string, fallback: number): number {
  const value = readAttribute(element, name);
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Boolean stored as an integer (`0` / `1`). */
export function readBool(element: XmlElement, name: string, fallback: boolean): boolean {
  return readInt(element, name, fallback ? 1 : 0) !== 0;
}

function toXmlElement(element: Element): XmlElement {
  const attributes: Array<readonly [string, string]> = [];
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i);
    if (attr) attributes.push([attr.name, attr.value]);
  }

  const children: XmlElement[] = [];
  for (let i = 0; i < element.childNodes.length; i++) {
    const node = element.childNodes.item(i);
    if (isElement(node)) children.push(toXmlElement(node));
  }

  return { tagName: element.tagName, attributes, children };
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}
