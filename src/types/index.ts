/**
 * doxygen-md - Type Definitions
 *
 * Core type definitions for doxygen-md.
 * These types describe the XML tree, the documentation model read from it,
 * and the public configuration interfaces.
 */


// XML Tree Types


/**
 * A text run inside an element, in document order
 */
export interface XmlText {
  type: 'text';
  value: string;
}

/**
 * An XML element with its attributes and ordered children
 */
export interface XmlElement {
  type: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;


// Documentation Model Types


/**
 * A brief or detailed description, or the body of a simple section
 */
export interface Description {
  type: 'description';
  /** Raw descendant text of every direct paragraph, untrimmed */
  paragraphs: string[];
  /** Raw descendant text of the whole node */
  text: string;
}

/**
 * A tagged annotation block inside a detailed description
 */
export interface SimpleSection {
  type: 'simplesect';
  /** Value of the `kind` attribute, e.g. "return" */
  kind: string;
  body: Description;
}

export interface DetailedDescription extends Description {
  /** Raw text of each direct code listing */
  listings: string[];
  sections: SimpleSection[];
}

export interface EnumValue {
  type: 'enumvalue';
  name: string;
  brief?: Description;
}

export interface Enumeration {
  type: 'enum';
  name: string;
  brief?: Description;
  values: EnumValue[];
}

export type CompoundKind = 'class' | 'struct' | 'namespace' | 'file' | (string & {});

export interface Compound {
  type: 'compound';
  kind: CompoundKind;
  name: string;
  brief?: Description;
  detailed?: Description;
  enums: Enumeration[];
}

export interface Parameter {
  type: 'param';
  name: string;
  /** Trimmed type text, may be empty */
  paramType: string;
  brief?: Description;
}

export interface Member {
  type: 'member';
  name: string;
  argsstring: string;
  /** Trimmed return type, may be empty */
  returnType: string;
  brief?: Description;
  detailed?: DetailedDescription;
  params: Parameter[];
  /** Entries of the member's own template-parameter list, if it has one */
  templateParams?: string[];
}

/**
 * Everything the renderer needs from one XML document
 */
export interface DoxygenDocument {
  /** Compound definitions at any depth, in document order */
  compounds: Compound[];
  /** Member definitions at any depth, in document order */
  members: Member[];
}


// Configuration Types


/**
 * Options accepted by the command-line wrapper
 */
export interface DoxygenMdConfig {
  /** Input file or directory; stdin when omitted */
  input?: string;
  /** Directory receiving grouped Markdown files (default: './doxygen_md_output') */
  outDir?: string;
  /** Glob selecting XML files inside an input directory (default: '*.xml') */
  pattern?: string;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Resolved configuration with defaults applied
 */
export interface ResolvedConfig extends Required<Omit<DoxygenMdConfig, 'input'>> {
  input?: string;
}


// Logger Interface


export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
