import { describe, it, expect } from 'vitest';
import { readDocument } from '../doxygen';
import { parseXml } from '../xml';

function read(xml: string) {
  return readDocument(parseXml(xml));
}

describe('readDocument', () => {
  it('should read compounds with their nested enums', () => {
    const document = read(
      '<doxygen><compounddef kind="namespace"><compoundname>geo</compoundname>' +
        '<sectiondef><enum><name>Axis</name><enumvalue><name>X</name></enumvalue></enum></sectiondef>' +
        '</compounddef></doxygen>'
    );

    expect(document.compounds).toHaveLength(1);
    expect(document.compounds[0].kind).toBe('namespace');
    expect(document.compounds[0].name).toBe('geo');
    expect(document.compounds[0].enums.map(e => e.name)).toEqual(['Axis']);
    expect(document.compounds[0].enums[0].values.map(v => v.name)).toEqual(['X']);
  });

  it('should resolve names through their fallbacks', () => {
    const document = read(
      '<doxygen><compounddef>' +
        '<enum><name></name><definition>enum Mode</definition><enumvalue><id>mode_fast</id></enumvalue></enum>' +
        '<enum><enumvalue/></enum>' +
        '</compounddef></doxygen>'
    );
    const [first, second] = document.compounds[0].enums;

    expect(document.compounds[0].kind).toBe('');
    expect(document.compounds[0].name).toBe('');
    expect(first.name).toBe('enum Mode');
    expect(first.values[0].name).toBe('mode_fast');
    expect(second.name).toBe('');
    expect(second.values[0].name).toBe('');
  });

  it('should read members found at any depth', () => {
    const document = read(
      '<doxygen><memberdef><name>a</name></memberdef>' +
        '<compounddef><sectiondef><memberdef><name>b</name></memberdef></sectiondef></compounddef></doxygen>'
    );

    expect(document.members.map(m => m.name)).toEqual(['a', 'b']);
  });

  it('should read parameters with trimmed types and name fallbacks', () => {
    const document = read(
      '<doxygen><memberdef><name>f</name><type> const <ref>Vec</ref> &amp; </type>' +
        '<param><type> <ref>Vec</ref> </type><defname>v</defname></param>' +
        '<param><declname>k</declname><briefdescription><para>Factor.</para></briefdescription></param>' +
        '</memberdef></doxygen>'
    );
    const [member] = document.members;

    expect(member.returnType).toBe('const Vec &');
    expect(member.params.map(p => [p.name, p.paramType])).toEqual([
      ['v', 'Vec'],
      ['k', ''],
    ]);
    expect(member.params[1].brief?.paragraphs).toEqual(['Factor.']);
  });

  it('should read code listings and simple sections of the detailed description', () => {
    const document = read(
      '<doxygen><memberdef><detaileddescription>' +
        '<para>Body.</para>' +
        '<programlisting><codeline><highlight>x = 1;</highlight></codeline></programlisting>' +
        '<simplesect kind="return"><para>One.</para></simplesect>' +
        '<simplesect><para>Untagged.</para></simplesect>' +
        '</detaileddescription></memberdef></doxygen>'
    );
    const detailed = document.members[0].detailed;

    expect(detailed?.paragraphs).toEqual(['Body.']);
    expect(detailed?.listings).toEqual(['x = 1;']);
    expect(detailed?.sections.map(s => s.kind)).toEqual(['return', '']);
    expect(detailed?.sections[0].body.paragraphs).toEqual(['One.']);
  });

  it('should read only the member\'s own template-parameter list', () => {
    const document = read(
      '<doxygen><compounddef><templateparamlist><param><type>typename T</type></param></templateparamlist>' +
        '<memberdef><name>inherited</name></memberdef>' +
        '<memberdef><name>own</name><templateparamlist>' +
        '<param><type>class U</type></param><param> int N </param>' +
        '</templateparamlist></memberdef>' +
        '</compounddef></doxygen>'
    );
    const [inherited, own] = document.members;

    expect(inherited.templateParams).toBeUndefined();
    expect(own.templateParams).toEqual(['class U', 'int N']);
    expect(own.params).toEqual([]);
  });
});
