/**
 * doxygen-md - Converter
 *
 * The conversion pipeline: parse XML, read the Doxygen model, render Markdown.
 */

import { parseXml, readDocument } from './parsers';
import { renderDocument } from './renderers';

/**
 * Convert Doxygen XML to Markdown.
 *
 * The result always ends in exactly one newline. Nothing is returned for
 * partially readable input.
 *
 * @throws {MalformedInputError} when `doxygenXml` is not well-formed XML
 */
export function convert(doxygenXml: string): string {
  const root = parseXml(doxygenXml);
  return renderDocument(readDocument(root));
}
