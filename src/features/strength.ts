export type StrengthLevel = 'weak' | 'medium' | 'strong';

export interface StrengthResult {
  score: number;        // 0..5
  level: StrengthLevel;
  percentage: number;
  color: string;
  tips: string[];
  passedRules: number;
  totalRules: number;
}

export interface DetailedAnalysis {
  length: number;
  hasLowercase: boolean;
  hasUppercase: boolean;
  hasDigits: boolean;
  hasSymbols: boolean;
  hasSpaces: boolean;
  uniqueChars: number;
  lowercaseCount: number;
  uppercaseCount: number;
  digitCount: number;
  symbolCount: number;
}

export interface ComparisonResult {
  first:  { level: StrengthLevel; score: number };
  second: { level: StrengthLevel; score: number };
  winner: 'first' | 'second' | 'tie';
}

interface Rule {
  test: (password: string) => boolean;
  tip: string;
}

const LOWER_RE  = /[a-z]/g;
const UPPER_RE  = /[A-Z]/g;
const DIGIT_RE  = /[0-9]/g;
const SYMBOL_RE = /[@$!%*?&#]/g;

const WEAK_MAX   = 2;
const MEDIUM_MAX = 4;

const LEVEL_COLORS: Record<StrengthLevel, string> = {
  weak:   '#dc2626',
  medium: '#f59e0b',
  strong: '#16a34a',
};

// Порядок правил задаёт порядок подсказок
const RULES: Rule[] = [
  { test: p => charLength(p) >= 8,        tip: 'Minimum 8 characters' },
  { test: p => countOf(p, LOWER_RE) > 0,  tip: 'Add lowercase letters' },
  { test: p => countOf(p, UPPER_RE) > 0,  tip: 'Add uppercase letters' },
  { test: p => countOf(p, DIGIT_RE) > 0,  tip: 'Add numbers' },
  { test: p => countOf(p, SYMBOL_RE) > 0, tip: 'Add symbols' },
];

function charLength(password: string): number {
  return [...password].length;
}

function countOf(password: string, re: RegExp): number {
  return password.match(re)?.length ?? 0;
}

export function levelForScore(score: number): StrengthLevel {
  if (score <= WEAK_MAX)   return 'weak';
  if (score <= MEDIUM_MAX) return 'medium';
  return 'strong';
}

export function colorForLevel(level: StrengthLevel): string {
  return LEVEL_COLORS[level];
}

export function checkStrength(password: string): StrengthResult {
  const tips: string[] = [];
  let score = 0;

  for (const rule of RULES) {
    if (rule.test(password)) score++;
    else tips.push(rule.tip);
  }

  const level = levelForScore(score);
  return {
    score,
    level,
    percentage: (score * 100) / RULES.length,
    color: colorForLevel(level),
    tips,
    passedRules: score,
    totalRules: RULES.length,
  };
}

export const isStrong = (password: string) => checkStrength(password).level === 'strong';
export const isMedium = (password: string) => checkStrength(password).level === 'medium';
export const isWeak   = (password: string) => checkStrength(password).level === 'weak';

export function getDetailedAnalysis(password: string): DetailedAnalysis {
  const lowercaseCount = countOf(password, LOWER_RE);
  const uppercaseCount = countOf(password, UPPER_RE);
  const digitCount     = countOf(password, DIGIT_RE);
  const symbolCount    = countOf(password, SYMBOL_RE);

  return {
    length: charLength(password),
    hasLowercase: lowercaseCount > 0,
    hasUppercase: uppercaseCount > 0,
    hasDigits: digitCount > 0,
    hasSymbols: symbolCount > 0,
    hasSpaces: /\s/.test(password),
    uniqueChars: new Set(password).size,
    lowercaseCount,
    uppercaseCount,
    digitCount,
    symbolCount,
  };
}

/** Higher score wins; equal scores tie. */
export function comparePasswords(a: string, b: string): ComparisonResult {
  const sa = checkStrength(a);
  const sb = checkStrength(b);

  const winner =
    sa.score > sb.score ? 'first' :
    sb.score > sa.score ? 'second' : 'tie';

  return {
    first:  { level: sa.level, score: sa.score },
    second: { level: sb.level, score: sb.score },
    winner,
  };
}
