/**
 * doxygen-md - Markdown Renderer
 *
 * Turns the documentation model into Markdown. Compounds (with their enums)
 * are rendered first, then every member definition, each in document order.
 * Blocks are collected in one list and joined with single newlines.
 */

import type { Compound, DetailedDescription, DoxygenDocument, Enumeration, Member, Parameter } from '../types';
import { extractText, slugify } from './text';

/** Compound kinds that get their own heading */
const HEADED_KINDS: ReadonlySet<string> = new Set(['class', 'struct', 'namespace']);

/** Listings are always fenced as C++, whatever they contain */
const CODE_LANGUAGE = 'cpp';

const RETURNS_LABEL = '**Returns:**';

/** How far back to look for a returns block before adding the type fallback */
const RETURNS_LOOKBACK = 3;


// Main Renderer


/**
 * Render a whole document to Markdown ending in exactly one newline
 */
export function renderDocument(document: DoxygenDocument): string {
  const blocks: string[] = [];

  for (const compound of document.compounds) {
    renderCompound(compound, blocks);
  }

  for (const member of document.members) {
    renderMember(member, blocks);
  }

  return `${blocks.join('\n').trim()}\n`;
}

function pushText(blocks: string[], text: string): void {
  if (text) {
    blocks.push(text);
  }
}


// Compounds


function renderCompound(compound: Compound, blocks: string[]): void {
  if (HEADED_KINDS.has(compound.kind)) {
    blocks.push(`## ${compound.name}`);
    pushText(blocks, extractText(compound.brief));
    pushText(blocks, extractText(compound.detailed));
  }

  for (const enumeration of compound.enums) {
    renderEnumeration(enumeration, blocks);
  }
}

function renderEnumeration(enumeration: Enumeration, blocks: string[]): void {
  blocks.push(`### Enum: ${enumeration.name}`);
  pushText(blocks, extractText(enumeration.brief));

  for (const value of enumeration.values) {
    blocks.push(`- \`${value.name}\`: ${extractText(value.brief)}`);
  }
}


// Members


function renderMember(member: Member, blocks: string[]): void {
  blocks.push(`### ${member.name}${member.argsstring}`);

  const anchor = slugify(`${member.name} ${member.argsstring}`);

  const brief = extractText(member.brief);
  if (brief) {
    blocks.push(`**Brief:** ${brief}`);
  }

  if (member.detailed) {
    renderDetailed(member.detailed, blocks);
  }

  if (member.params.length > 0) {
    blocks.push('**Parameters:**');
    blocks.push('| Name | Type | Description |');
    blocks.push('| --- | --- | --- |');
    for (const param of member.params) {
      blocks.push(renderParameterRow(param, anchor));
    }
  }

  if (member.templateParams && member.templateParams.length > 0) {
    blocks.push('**Template parameters:**');
    for (const entry of member.templateParams) {
      blocks.push(`- ${entry}`);
    }
  }

  if (member.returnType && !blocks.slice(-RETURNS_LOOKBACK).some(block => block.startsWith(RETURNS_LABEL))) {
    blocks.push(`**Type:** ${member.returnType}`);
  }

  blocks.push('');
}

function renderDetailed(detailed: DetailedDescription, blocks: string[]): void {
  pushText(blocks, extractText(detailed));

  for (const listing of detailed.listings) {
    const code = listing.replace(/^\n+|\n+$/g, '');
    if (code) {
      blocks.push(`\`\`\`${CODE_LANGUAGE}\n${code}\n\`\`\``);
    }
  }

  for (const section of detailed.sections) {
    if (section.kind !== 'return') {
      continue;
    }
    const text = extractText(section.body);
    if (text) {
      blocks.push(`${RETURNS_LABEL} ${text}`);
    }
  }
}

/**
 * One table row: linked name, linked type, brief description
 */
function renderParameterRow(param: Parameter, memberAnchor: string): string {
  const typeSlug = slugify(param.paramType);
  const typeCell = typeSlug
    ? `[\`${param.paramType}\`](#type-${typeSlug})`
    : `\`${param.paramType}\``;

  const nameCell = param.name
    ? `[\`${param.name}\`](#${memberAnchor}-${slugify(param.name)})`
    : '';

  return `| ${nameCell} | ${typeCell} | ${extractText(param.brief)} |`;
}
