/**
 * doxygen-md - Parser Index
 *
 * XML parsing and the Doxygen reader built on top of it.
 */

export { parseXml, childElements, findChild, findDescendants, textContent } from './xml';
export { readDocument, readDescription } from './doxygen';
