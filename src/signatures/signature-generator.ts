/**
 * Signature Generator
 *
 * Condenses a dependency file to its declaration lines, using lightweight
 * regex-based matching to stay within token budgets.
 */

import { detectLanguage, type LanguageTag } from '../context/resolvers/index.js';

export interface SignatureOptions {
  /** Also keep decorators, annotations, docstrings and comments next to declarations */
  detailed?: boolean;
}

interface SignatureRules {
  declarations: RegExp[];
  /** Decorator / annotation lines */
  annotation: RegExp | null;
  comment: RegExp;
  /** Docstring opener on the line after a declaration */
  docstring: RegExp | null;
}

const C_STYLE_COMMENT = /^\s*(?:\/\/|\/\*|\*)/;

const ECMASCRIPT_RULES: SignatureRules = {
  declarations: [
    /^\s*(?:export\s+)?(?:default\s+)?(?:declare\s+)?(?:async\s+)?function\*?\s*[\w$]*\s*[(<]/,
    /^\s*(?:export\s+)?(?:default\s+)?(?:declare\s+)?(?:abstract\s+)?class\s+[\w$]+/,
    /^\s*(?:export\s+)?(?:declare\s+)?interface\s+[\w$]+/,
    /^\s*(?:export\s+)?(?:declare\s+)?type\s+[\w$]+(?:<[^>]*>)?\s*=/,
    /^\s*(?:export\s+)?(?:declare\s+)?(?:const\s+)?enum\s+[\w$]+/,
    /^\s*export\s+(?:declare\s+)?(?:const|let|var)\s+[\w$]+/,
    // class members: name(...) {  /  async name(...): T {
    /^\s+(?:(?:public|private|protected|static|readonly|abstract|override|async|get|set)\s+)*(?!(?:if|for|while|switch|catch|return|function|else|do)\b)[\w$#]+\s*(?:<[^>]*>)?\s*\([^)]*\)\s*(?::\s*[^{;]+)?\{\s*$/,
  ],
  annotation: /^\s*@[\w$.]+/,
  comment: C_STYLE_COMMENT,
  docstring: null,
};

const SIGNATURE_RULES: Record<LanguageTag, SignatureRules> = {
  python: {
    declarations: [
      /^\s*(?:async\s+)?def\s+\w+/,
      /^\s*class\s+\w+/,
      // module-level constants
      /^[A-Z][A-Z0-9_]*\s*(?::[^=]+)?=/,
    ],
    annotation: /^\s*@[\w.]+/,
    comment: /^\s*#/,
    docstring: /^\s*[rbuRBU]?("""|''')/,
  },
  typescript: ECMASCRIPT_RULES,
  javascript: ECMASCRIPT_RULES,
  java: {
    declarations: [
      /^\s*(?:(?:public|protected|private|abstract|static|final|sealed|non-sealed|strictfp)\s+)*(?:class|interface|enum|record|@interface)\s+\w+/,
      // methods need at least one modifier so plain statements never match
      /^\s*(?:(?:public|protected|private|abstract|static|final|synchronized|native|default)\s+)+[\w<>[\],.?\s]+\s+\w+\s*\(/,
      // constructors
      /^\s*(?:public|protected|private)\s+[A-Z]\w*\s*\(/,
    ],
    annotation: /^\s*@\w+/,
    comment: C_STYLE_COMMENT,
    docstring: null,
  },
  go: {
    declarations: [/^func\s+/, /^type\s+\w+/],
    annotation: null,
    comment: /^\s*\/\//,
    docstring: null,
  },
};

/**
 * Strip a trailing body opener ({ or :) and trailing whitespace.
 */
function cleanLine(line: string, language: LanguageTag): string {
  const trimmed = line.replace(/\s+$/, '');
  if (language === 'python') {
    return trimmed.replace(/:$/, '');
  }
  return trimmed.replace(/\s*\{$/, '');
}

function isDecoration(line: string, rules: SignatureRules): boolean {
  return (rules.annotation?.test(line) ?? false) || rules.comment.test(line);
}

/**
 * Generate the signature lines of one file.
 * Files in unsupported languages yield no lines.
 */
export function generateSignature(
  filePath: string,
  content: string,
  options: SignatureOptions = {}
): string[] {
  const language = detectLanguage(filePath);
  if (!language) return [];

  const rules = SIGNATURE_RULES[language];
  const lines = content.split(/\r?\n/);
  const keep = new Set<number>();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!rules.declarations.some((pattern) => pattern.test(line))) continue;

    keep.add(i);

    if (!options.detailed) continue;

    // Decorators and comments directly above
    for (let j = i - 1; j >= 0 && !keep.has(j) && isDecoration(lines[j], rules); j--) {
      keep.add(j);
    }
    if (rules.docstring && i + 1 < lines.length && rules.docstring.test(lines[i + 1])) {
      keep.add(i + 1);
    }
  }

  return [...keep]
    .sort((a, b) => a - b)
    .map((index) => {
      const line = lines[index];
      return rules.declarations.some((pattern) => pattern.test(line))
        ? cleanLine(line, language)
        : line.replace(/\s+$/, '');
    });
}
