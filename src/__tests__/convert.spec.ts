import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { convert } from '../convert';
import { MalformedInputError } from '../core/errors';

const fixture = readFileSync(path.join(__dirname, 'fixtures', 'doxygen_all.xml'), 'utf-8');

const FENCE = '```';

describe('convert', () => {
  it('should render the whole fixture', () => {
    const expected = [
      '## Math',
      'Utility math functions.',
      'Stateless helpers.',
      '### Enum: Color',
      'Primary colors.',
      '- `Red`: The red channel.',
      '- `Green`: ',
      '### max(T a, T b)',
      '**Brief:** Larger of two values.',
      '**Parameters:**',
      '| Name | Type | Description |',
      '| --- | --- | --- |',
      '| [`a`](#max-t-a-t-b-a) | [`T`](#type-t) | First value. |',
      '| [`b`](#max-t-a-t-b-b) | [`T`](#type-t) |  |',
      '**Template parameters:**',
      '- typename T',
      '**Type:** T',
      '',
      '### add(int a, int b)',
      '**Brief:** Add two integers.',
      'Adds a and b.',
      `${FENCE}cpp`,
      'int result = add(2, 3);',
      FENCE,
      '**Returns:** Sum of a and b.',
      '**Parameters:**',
      '| Name | Type | Description |',
      '| --- | --- | --- |',
      '| [`a`](#add-int-a-int-b-a) | [`int`](#type-int) | First operand. |',
      '| [`b`](#add-int-a-int-b-b) | [`int`](#type-int) | Second operand. |',
      '**Type:** int',
    ].join('\n') + '\n';

    expect(convert(fixture)).toBe(expected);
  });

  it('should be deterministic', () => {
    expect(convert(fixture)).toBe(convert(fixture));
  });

  it('should produce a lone newline for a document without definitions', () => {
    expect(convert('<doxygen/>')).toBe('\n');
    expect(convert('<doxygen>\n  <compounddef kind="file"><compoundname>a.h</compoundname></compounddef>\n</doxygen>')).toBe('\n');
  });

  it('should end with exactly one newline and no leading blank lines', () => {
    const markdown = convert(fixture);

    expect(markdown.startsWith('## Math')).toBe(true);
    expect(markdown.endsWith('**Type:** int\n')).toBe(true);
  });

  it('should reject text that is not XML', () => {
    expect(() => convert('not xml <')).toThrow(MalformedInputError);
    expect(() => convert('')).toThrow(MalformedInputError);
    expect(() => convert('<doxygen><compounddef></doxygen>')).toThrow(MalformedInputError);
  });

  it('should reject trailing content and a second root element', () => {
    expect(() => convert('<a/>junk')).toThrow(MalformedInputError);
    expect(() => convert('<a/><b/>')).toThrow(MalformedInputError);
    expect(() => convert(`${fixture}<doxygen/>`)).toThrow(MalformedInputError);
  });

  it('should keep the text of elements whatever their name', () => {
    const xml =
      '<doxygen><compounddef kind="class"><compoundname>A</compoundname>' +
      '<briefdescription><para>a <__text__>b<x>c</x></__text__> d</para></briefdescription>' +
      '</compounddef></doxygen>';

    expect(convert(xml)).toBe('## A\na bc d\n');
  });

  it('should carry the parser diagnostic on failure', () => {
    try {
      convert('not xml <');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedInputError);
      if (error instanceof MalformedInputError) {
        expect(error.code).toBe('DOXYGEN_MD_MALFORMED_INPUT');
        expect(error.message.startsWith('Input is not valid XML Doxygen output: ')).toBe(true);
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });

  it('should let a detailed description without paragraphs fall back to its raw text', () => {
    const xml =
      '<doxygen><memberdef><type>int</type><name>zero</name><argsstring>()</argsstring>' +
      '<detaileddescription><simplesect kind="return"><para>Zero.</para></simplesect></detaileddescription>' +
      '</memberdef></doxygen>';

    expect(convert(xml)).toBe('### zero()\nZero.\n**Returns:** Zero.\n');
  });
});
