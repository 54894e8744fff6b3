/**
 * Bundle Renderer
 *
 * Assembles primary file contents and dependency signatures into one
 * markdown document.
 */

import { extname, isAbsolute, relative, sep } from 'path';
import { detectLanguage } from '../context/resolvers/index.js';
import { fitToTokenBudget } from '../context/token-budget.js';

export interface PrimaryFileContent {
  path: string;
  content: string;
}

export interface FileSignature {
  path: string;
  /** Signature lines, or null when the file could not be read */
  lines: string[] | null;
  error?: string;
}

export interface RenderInput {
  primaryFiles: PrimaryFileContent[];
  signatures: FileSignature[];
  sigOnly: boolean;
  /** Token budget for the signatures section (unlimited when undefined) */
  sigTokens?: number;
  /** Paths are shown relative to this directory */
  baseDir: string;
}

export interface RenderedBundle {
  markdown: string;
  signatureTokens: number;
  omittedSignatures: number;
}

const EXTRA_FENCES: Record<string, string> = {
  '.c': 'cpp',
  '.cpp': 'cpp',
  '.h': 'cpp',
  '.hpp': 'cpp',
  '.json': 'json',
};

/**
 * Code fence language for a file.
 */
export function fenceLanguage(filePath: string): string {
  return detectLanguage(filePath) ?? EXTRA_FENCES[extname(filePath).toLowerCase()] ?? '';
}

/**
 * Path relative to the base directory with forward slashes; files outside
 * the base directory keep their absolute path.
 */
export function toDisplayPath(filePath: string, baseDir: string): string {
  const rel = relative(baseDir, filePath);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return filePath;
  }
  return rel.split(sep).join('/');
}

function codeBlock(title: string, fence: string, body: string): string {
  return `### ${title}\n\`\`\`${fence}\n${body}\n\`\`\`\n\n`;
}

function signatureBody(signature: FileSignature): string {
  if (signature.lines === null) {
    return `Error reading: ${signature.error ?? 'unknown error'}`;
  }
  return signature.lines.length > 0 ? signature.lines.join('\n') : '(no signatures)';
}

/**
 * Render the bundle markdown.
 */
export function renderBundle(input: RenderInput): RenderedBundle {
  let markdown = '# Context\n\n';

  if (!input.sigOnly && input.primaryFiles.length > 0) {
    markdown += '## Primary Files (Full Content)\n\n';
    for (const file of input.primaryFiles) {
      markdown += codeBlock(toDisplayPath(file.path, input.baseDir), fenceLanguage(file.path), file.content);
    }
  }

  if (input.signatures.length === 0) {
    return { markdown, signatureTokens: 0, omittedSignatures: 0 };
  }

  const budgeted = fitToTokenBudget(
    input.signatures.map((signature) => ({ key: signature.path, text: signatureBody(signature) })),
    input.sigTokens
  );

  markdown += `## ${input.sigOnly ? 'File Signatures' : 'Dependencies (Signatures)'}\n\n`;
  for (const entry of budgeted.kept) {
    markdown += codeBlock(toDisplayPath(entry.key, input.baseDir), fenceLanguage(entry.key), entry.text);
  }

  if (budgeted.omitted > 0) {
    const kind = input.sigOnly ? 'files' : 'dependency files';
    markdown += `_${budgeted.omitted} more ${kind} omitted (signature token budget reached)_\n`;
  }

  return {
    markdown,
    signatureTokens: budgeted.tokenCount,
    omittedSignatures: budgeted.omitted,
  };
}
