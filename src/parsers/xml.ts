/**
 * doxygen-md - XML Parser
 *
 * Parses XML text into an ordered element/text tree. Mixed content keeps its
 * document order so that text can be concatenated across markup boundaries.
 *
 * The tree is built from sax events (the strict parser xml2js runs on) so
 * that errors after the root element are reported as well.
 */

import { parser as createSaxParser } from 'sax';
import type { XmlElement, XmlNode } from '../types';
import { MalformedInputError } from '../core/errors';


// Main Parser


/**
 * Parse XML text and return its root element
 *
 * @throws {MalformedInputError} when the text is not well-formed XML
 */
export function parseXml(text: string): XmlElement {
  const sax = createSaxParser(true, { trim: false, normalize: false });
  const errors: Error[] = [];
  const stack: XmlElement[] = [];
  const document: { root?: XmlElement } = {};

  const appendText = (value: string) => {
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push({ type: 'text', value });
    } else if (value.trim() !== '') {
      errors.push(new Error('Text data outside of root node.'));
    }
  };

  sax.onerror = (error) => {
    errors.push(error);
    // Keep reading so that later errors are collected too
    sax.resume();
  };

  sax.onopentag = (tag) => {
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(tag.attributes)) {
      attributes[key] = typeof value === 'string' ? value : value.value;
    }

    const element: XmlElement = { type: 'element', name: tag.name, attributes, children: [] };
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else if (document.root) {
      errors.push(new Error(`Unexpected element <${tag.name}> after the root element.`));
    } else {
      document.root = element;
    }
    stack.push(element);
  };

  sax.onclosetag = () => {
    stack.pop();
  };

  sax.ontext = appendText;
  sax.oncdata = appendText;

  try {
    sax.write(text).close();
  } catch (error) {
    errors.push(error instanceof Error ? error : new Error(String(error)));
  }

  const [first] = errors;
  if (first) {
    throw new MalformedInputError(first.message.trim().split('\n').join(' '), first);
  }

  if (!document.root) {
    throw new MalformedInputError('document has no root element');
  }

  return document.root;
}


// Tree Queries


export function isElement(node: XmlNode): node is XmlElement {
  return node.type === 'element';
}

/**
 * Direct element children, optionally filtered by tag name
 */
export function childElements(element: XmlElement, name?: string): XmlElement[] {
  return element.children.filter(
    (child): child is XmlElement => isElement(child) && (name === undefined || child.name === name)
  );
}

/**
 * First direct element child with the given tag name
 */
export function findChild(element: XmlElement, name: string): XmlElement | undefined {
  return childElements(element, name)[0];
}

/**
 * All descendant elements with the given tag name, in document order
 */
export function findDescendants(element: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = [];

  const visit = (current: XmlElement) => {
    for (const child of childElements(current)) {
      if (child.name === name) {
        found.push(child);
      }
      visit(child);
    }
  };

  visit(element);
  return found;
}

/**
 * Concatenate every descendant text run of a node, ignoring markup
 */
export function textContent(node: XmlNode): string {
  if (node.type === 'text') {
    return node.value;
  }
  return node.children.map(textContent).join('');
}
