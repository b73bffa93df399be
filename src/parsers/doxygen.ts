/**
 * doxygen-md - Doxygen Reader
 *
 * Reads the subset of Doxygen's XML schema that doxygen-md renders
 * (compounddef, enum, memberdef and their descriptions) into the
 * documentation model. Missing elements and attributes resolve to the
 * defaults below; reading never fails.
 *
 * Field resolution, in order of precedence:
 * - compound name:       compoundname, ''
 * - enum name:           name, definition, ''
 * - enum value name:     name, id, ''
 * - member name:         name, ''   (argsstring and return type likewise)
 * - parameter name:      declname, defname, ''
 * - template parameter:  type, raw text of the entry
 *
 * A child counts as missing when it is absent or its text is empty.
 */

import type {
  Compound,
  Description,
  DetailedDescription,
  DoxygenDocument,
  EnumValue,
  Enumeration,
  Member,
  Parameter,
  SimpleSection,
  XmlElement,
} from '../types';
import { childElements, findChild, findDescendants, textContent } from './xml';


// Main Reader


/**
 * Read every compound and member definition below the document root
 */
export function readDocument(root: XmlElement): DoxygenDocument {
  return {
    compounds: findDescendants(root, 'compounddef').map(readCompound),
    members: findDescendants(root, 'memberdef').map(readMember),
  };
}


// Field Resolution


/**
 * Text of the first direct child named by each tag, falling through empty ones
 */
function childText(element: XmlElement, ...names: string[]): string {
  for (const name of names) {
    const child = findChild(element, name);
    const text = child ? textContent(child) : '';
    if (text) {
      return text;
    }
  }
  return '';
}

function optionalDescription(element: XmlElement, name: string): Description | undefined {
  const child = findChild(element, name);
  return child ? readDescription(child) : undefined;
}


// Descriptions


export function readDescription(element: XmlElement): Description {
  return {
    type: 'description',
    paragraphs: childElements(element, 'para').map(textContent),
    text: textContent(element),
  };
}

function readDetailedDescription(element: XmlElement): DetailedDescription {
  return {
    ...readDescription(element),
    listings: childElements(element, 'programlisting').map(textContent),
    sections: childElements(element, 'simplesect').map(readSimpleSection),
  };
}

function readSimpleSection(element: XmlElement): SimpleSection {
  return {
    type: 'simplesect',
    kind: element.attributes.kind ?? '',
    body: readDescription(element),
  };
}


// Compounds and Enumerations


function readCompound(element: XmlElement): Compound {
  return {
    type: 'compound',
    kind: element.attributes.kind ?? '',
    name: childText(element, 'compoundname'),
    brief: optionalDescription(element, 'briefdescription'),
    detailed: optionalDescription(element, 'detaileddescription'),
    enums: findDescendants(element, 'enum').map(readEnumeration),
  };
}

function readEnumeration(element: XmlElement): Enumeration {
  return {
    type: 'enum',
    name: childText(element, 'name', 'definition'),
    brief: optionalDescription(element, 'briefdescription'),
    values: childElements(element, 'enumvalue').map(readEnumValue),
  };
}

function readEnumValue(element: XmlElement): EnumValue {
  return {
    type: 'enumvalue',
    name: childText(element, 'name', 'id'),
    brief: optionalDescription(element, 'briefdescription'),
  };
}


// Members


function readMember(element: XmlElement): Member {
  const detailed = findChild(element, 'detaileddescription');
  const templateList = findChild(element, 'templateparamlist');

  return {
    type: 'member',
    name: childText(element, 'name'),
    argsstring: childText(element, 'argsstring'),
    returnType: childText(element, 'type').trim(),
    brief: optionalDescription(element, 'briefdescription'),
    detailed: detailed ? readDetailedDescription(detailed) : undefined,
    params: childElements(element, 'param').map(readParameter),
    // Only the member's own list; an enclosing template's list is not inherited
    templateParams: templateList
      ? childElements(templateList, 'param').map(entry => (childText(entry, 'type') || textContent(entry)).trim())
      : undefined,
  };
}

function readParameter(element: XmlElement): Parameter {
  return {
    type: 'param',
    name: childText(element, 'declname', 'defname'),
    paramType: childText(element, 'type').trim(),
    brief: optionalDescription(element, 'briefdescription'),
  };
}
