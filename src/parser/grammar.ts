/**
 * PEG grammar for the bodies of the array and string layouts, i.e. the text
 * between the brackets or quotes. Compiled by peggy at runtime.
 *
 * Both start rules return the byte tokens as strings; radix validation and
 * range checks happen after parsing.
 */
export const REPR_GRAMMAR = `
ArrayItems
  = _ head:Digits _ tail:("," _ @Digits _)* { return [head].concat(tail); }
  / _ { return []; }

StringItems
  = head:Digits tail:("_" @Digits)* { return [head].concat(tail); }

Digits "byte digits"
  = $[0-9a-zA-Z]+

_ "whitespace"
  = [ \\t\\r\\n]*
`;

export const REPR_START_RULES = ['ArrayItems', 'StringItems'] as const;

export type ReprStartRule = (typeof REPR_START_RULES)[number];
