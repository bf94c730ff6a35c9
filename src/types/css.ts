import type { FamilyCodepoints } from './glyphs.js';

export interface CssBlock {
  /** Prelude text before `{`, trimmed. At-rules keep their leading `@`. */
  selector: string;
  /** Raw text between the braces of this block, nested blocks excluded. */
  body: string;
}

export interface FontFamilyRule {
  selector: string;
  family: string;
}

export interface FontFaceDeclaration {
  family: string;
  src: string;
  weight?: string;
  style?: string;
}

export type CssVariableTable = Map<string, string>;

export interface StaticAnalysis {
  charsPerFamily: FamilyCodepoints;
  fontFaces: FontFaceDeclaration[];
}
