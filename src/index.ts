/**
 * doxygen-md - Main Entry Point
 *
 * Converts Doxygen XML output into Markdown.
 *
 * @example
 * ```typescript
 * import { convert } from 'doxygen-md';
 * import { readFileSync } from 'node:fs';
 *
 * const markdown = convert(readFileSync('xml/classMath.xml', 'utf-8'));
 * ```
 *
 * @packageDocumentation
 */

// Exports

export { convert } from './convert';

// Re-export types
export type {
  XmlNode,
  XmlElement,
  XmlText,
  Description,
  DetailedDescription,
  SimpleSection,
  Compound,
  CompoundKind,
  Enumeration,
  EnumValue,
  Member,
  Parameter,
  DoxygenDocument,
  DoxygenMdConfig,
  ResolvedConfig,
  Logger,
} from './types';

// Re-export utilities for advanced usage
export { parseXml, readDocument } from './parsers';
export { renderDocument, extractText, slugify } from './renderers';
export { resolveGroup, groupForDocument, GLOBAL_GROUP } from './cli/grouping';
export type { GroupSource } from './cli/grouping';
export { runCli, convertDirectory } from './cli';
export type { CliIO, DirectoryResult } from './cli';
export {
  resolveConfig,
  createLogger,
  silentLogger,
  DoxygenMdError,
  MalformedInputError,
  isDoxygenMdError,
  getExitCode,
} from './core';
export type { ErrorCode } from './core';
