/**
 * doxygen-md - Renderer Exports
 */

export { renderDocument } from './markdown';
export { extractText, slugify } from './text';
