/**
 * Code-generation metrics: fenced block detection, a syntax check, a
 * dangerous-pattern scan and the unbiased pass@k estimator.
 */

import { Script } from 'node:vm';

import type { MetricMap } from '../types.js';
import { MetricFamily } from './base.js';

export interface CodeSample {
  output: string;
  /** One outcome per generated sample; enables `pass_at_k`. */
  testResults?: readonly boolean[] | null;
  /** Overrides the family's language for this sample. */
  language?: string | null;
}

export interface CodeMetricsOptions {
  /** The k of pass@k. */
  k?: number;
  language?: string;
}

interface SecurityPattern {
  name: string;
  pattern: RegExp;
  description: string;
}

export const SECURITY_PATTERNS: readonly SecurityPattern[] = [
  { name: 'eval', pattern: /\beval\s*\(/, description: 'Use of eval() can execute arbitrary code' },
  { name: 'exec', pattern: /\bexec\s*\(/, description: 'Use of exec() can execute arbitrary code' },
  {
    name: 'subprocess',
    pattern: /\bsubprocess\b/,
    description: 'subprocess module can run arbitrary shell commands',
  },
  {
    name: 'os.system',
    pattern: /\bos\s*\.\s*system\s*\(/,
    description: 'os.system() can run arbitrary shell commands',
  },
  {
    name: 'os.popen',
    pattern: /\bos\s*\.\s*popen\s*\(/,
    description: 'os.popen() can run arbitrary shell commands',
  },
  {
    name: 'os.exec',
    pattern: /\bos\s*\.\s*exec[a-z]*\s*\(/,
    description: 'os.exec*() can replace the current process',
  },
  {
    name: '__import__',
    pattern: /\b__import__\s*\(/,
    description: '__import__() can dynamically import arbitrary modules',
  },
  {
    name: 'compile',
    pattern: /\bcompile\s*\(.*,\s*['"]exec['"]/,
    description: "compile() with 'exec' mode can prepare arbitrary code",
  },
  {
    name: 'pickle.loads',
    pattern: /\bpickle\s*\.\s*loads?\s*\(/,
    description: 'Unpickling untrusted data can execute arbitrary code',
  },
  {
    name: 'marshal.loads',
    pattern: /\bmarshal\s*\.\s*loads?\s*\(/,
    description: 'Unmarshalling untrusted data is unsafe',
  },
  { name: 'ctypes', pattern: /\bctypes\b/, description: 'ctypes provides low-level memory access' },
  {
    name: 'shutil.rmtree',
    pattern: /\bshutil\s*\.\s*rmtree\s*\(/,
    description: 'shutil.rmtree() can recursively delete directories',
  },
  {
    name: 'open_write',
    pattern: /\bopen\s*\(.*['"]w['"]/,
    description: 'Writing to files may overwrite important data',
  },
  {
    name: 'child_process',
    pattern: /\bchild_process\b/,
    description: 'child_process can run arbitrary shell commands',
  },
  {
    name: 'new Function',
    pattern: /\bnew\s+Function\s*\(/,
    description: 'new Function() can execute arbitrary code',
  },
  {
    name: 'fs.rmSync',
    pattern: /\bfs\s*\.\s*rmSync\s*\([^)]*recursive/,
    description: 'fs.rmSync() with recursive can delete directories',
  },
];

const SECURITY_SCORES: Readonly<Record<number, number>> = { 0: 1, 1: 0.7, 2: 0.4, 3: 0.2 };

const LANGUAGE_ALIASES: Readonly<Record<string, readonly string[]>> = {
  python: ['python', 'py'],
  javascript: ['javascript', 'js', 'jsx', 'mjs'],
  typescript: ['typescript', 'ts', 'tsx'],
};

const VM_CHECKED_LANGUAGES: ReadonlySet<string> = new Set(['javascript']);
const HASH_COMMENT_LANGUAGES: ReadonlySet<string> = new Set(['python', 'ruby', 'shell', 'bash']);

const ANY_FENCE = /```[\s\S]*?```/;
const GENERIC_BLOCK = /```[\w+-]*[^\S\n]*\n([\s\S]*?)```/g;

export class CodeMetrics extends MetricFamily<CodeSample> {
  readonly k: number;
  readonly language: string;

  constructor(opts?: CodeMetricsOptions) {
    super();
    this.k = opts?.k ?? 1;
    this.language = (opts?.language ?? 'python').toLowerCase();
    if (!Number.isInteger(this.k) || this.k < 1) {
      throw new Error(`k must be a positive integer, got ${this.k}`);
    }
  }

  protected getFields() {
    return { k: this.k, language: this.language };
  }
  protected getDefaults() {
    return { k: 1, language: 'python' };
  }

  zeroMetrics(): MetricMap {
    return { pass_at_k: null, syntax_valid: false, has_code_block: false, security_score: 0 };
  }

  evaluate(sample: CodeSample): MetricMap {
    const language = canonicalLanguage(sample.language ?? this.language);
    const code = extractCode(sample.output, language);
    const issues = scanSecurity(code);
    return {
      pass_at_k: sample.testResults ? this.evaluatePassAtK(sample.testResults) : null,
      syntax_valid: checkSyntax(code, language),
      has_code_block: hasCodeBlock(sample.output),
      security_issues: issues,
      security_score: securityScore(issues),
    };
  }

  evaluatePassAtK(testResults: readonly boolean[], k: number = this.k): number {
    return passAtK(testResults.length, testResults.filter(Boolean).length, k);
  }

  /**
   * pass@k averaged over problems, each a list of sample outcomes.
   */
  evaluateBatchPassAtK(
    problems: readonly (readonly boolean[])[],
    k: number = this.k,
  ): { passAtK: number; numProblems: number; k: number } {
    if (problems.length === 0) {
      return { passAtK: 0, numProblems: 0, k };
    }
    const total = problems.reduce((sum, results) => sum + this.evaluatePassAtK(results, k), 0);
    return { passAtK: total / problems.length, numProblems: problems.length, k };
  }
}

/**
 * Unbiased pass@k estimator `1 - C(n-c, k) / C(n, k)`, computed as a running
 * product so large `n` does not overflow.
 */
export function passAtK(n: number, c: number, k: number): number {
  if (n < k || c === 0) return 0;
  if (c >= n) return 1;
  if (n - c < k) return 1;
  let failAll = 1;
  for (let i = n - c + 1; i <= n; i++) {
    failAll *= 1 - k / i;
  }
  return 1 - failAll;
}

export function hasCodeBlock(text: string): boolean {
  return ANY_FENCE.test(text);
}

function canonicalLanguage(language: string): string {
  const lower = language.toLowerCase();
  for (const [canonical, aliases] of Object.entries(LANGUAGE_ALIASES)) {
    if (aliases.includes(lower)) return canonical;
  }
  return lower;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Source from fenced blocks: blocks tagged with the language (or untagged),
 * then any fenced block, then the whole text. Several blocks are joined with
 * a blank line.
 */
export function extractCode(text: string, language = 'python'): string {
  const aliases = LANGUAGE_ALIASES[canonicalLanguage(language)] ?? [language.toLowerCase()];
  const tagged = new RegExp(
    `\`\`\`(?:${aliases.map(escapeRegExp).join('|')})?[^\\S\\n]*\\n([\\s\\S]*?)\`\`\``,
    'gi',
  );
  for (const pattern of [tagged, GENERIC_BLOCK]) {
    const blocks = [...text.matchAll(pattern)].map((m) => m[1] ?? '');
    if (blocks.length > 0) {
      return blocks.join('\n\n');
    }
  }
  return text;
}

/**
 * JavaScript is compiled (never run) with `node:vm`; other languages get a
 * balanced-delimiter check that skips strings and line comments.
 */
export function checkSyntax(code: string, language = 'python'): boolean {
  const canonical = canonicalLanguage(language);
  if (VM_CHECKED_LANGUAGES.has(canonical)) {
    try {
      new Script(code, { filename: 'generated.js' });
      return true;
    } catch (e) {
      if (e instanceof SyntaxError) return false;
      throw e;
    }
  }
  return delimitersBalanced(code, HASH_COMMENT_LANGUAGES.has(canonical) ? '#' : '//');
}

const CLOSERS: Readonly<Record<string, string>> = { ')': '(', ']': '[', '}': '{' };

export function delimitersBalanced(code: string, commentPrefix: string): boolean {
  const stack: string[] = [];
  let i = 0;
  while (i < code.length) {
    const ch = code[i] ?? '';
    if (code.startsWith(commentPrefix, i)) {
      const end = code.indexOf('\n', i);
      i = end === -1 ? code.length : end;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      const triple = ch.repeat(3);
      const quote = ch !== '`' && code.startsWith(triple, i) ? triple : ch;
      const end = findStringEnd(code, i + quote.length, quote);
      if (end === -1) return false;
      i = end + quote.length;
      continue;
    }
    if (ch === '(' || ch === '[' || ch === '{') {
      stack.push(ch);
    } else if (ch in CLOSERS) {
      if (stack.pop() !== CLOSERS[ch]) return false;
    }
    i++;
  }
  return stack.length === 0;
}

function findStringEnd(code: string, start: number, quote: string): number {
  let i = start;
  while (i < code.length) {
    const ch = code[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    // single-quoted strings end at a newline; only triple quotes and backticks span lines
    if (ch === '\n' && quote.length === 1 && quote !== '`') return -1;
    if (code.startsWith(quote, i)) return i;
    i++;
  }
  return -1;
}

/**
 * `"name: description"` for every dangerous pattern present.
 */
export function scanSecurity(code: string): string[] {
  return SECURITY_PATTERNS.filter((p) => p.pattern.test(code)).map(
    (p) => `${p.name}: ${p.description}`,
  );
}

export function securityScore(issues: readonly string[]): number {
  return SECURITY_SCORES[issues.length] ?? 0;
}
