/**
 * doxygen-md - Output Grouping
 *
 * Chooses the directory a converted document is written to.
 */

import type { XmlElement } from '../types';
import { findChild, textContent } from '../parsers';

export const GLOBAL_GROUP = 'global';

const SCOPE_SEPARATOR = '::';

export interface GroupSource {
  kind: string;
  name: string;
}

/**
 * Namespaces group under their own name, scoped names under their first
 * scope, everything else under the global group
 */
export function resolveGroup(source?: GroupSource): string {
  const name = source?.name.trim() ?? '';
  const kind = source?.kind ?? '';

  if (kind === 'namespace' && name) {
    return name;
  }
  if (name.includes(SCOPE_SEPARATOR)) {
    return name.split(SCOPE_SEPARATOR)[0];
  }
  return GLOBAL_GROUP;
}

/**
 * Turn a group into a single directory name below the output directory
 */
export function toGroupDirectory(group: string): string {
  const directory = group.replace(/[\\/]/g, '_');
  return directory === '.' || directory === '..' ? GLOBAL_GROUP : directory;
}

/**
 * Grouping key of a parsed document, taken from its first top-level compound
 */
export function groupForDocument(root: XmlElement): string {
  const compound = findChild(root, 'compounddef');
  if (!compound) {
    return GLOBAL_GROUP;
  }

  const nameElement = findChild(compound, 'compoundname');
  return resolveGroup({
    kind: compound.attributes.kind ?? '',
    name: nameElement ? textContent(nameElement) : '',
  });
}
