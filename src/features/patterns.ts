export type Severity = 'high' | 'medium';

export type RepetitionType = 'consecutive' | 'sequence_repeat';
export type SequentialType =
  | 'lowercase_sequential'
  | 'uppercase_sequential'
  | 'digit_sequential'
  | 'keyboard_pattern';

export interface PatternMatch<T extends string> {
  type: T;
  pattern: string;
  position: number;
  severity: Severity;
}

export interface RepetitionReport {
  hasRepetitions: boolean;
  details: PatternMatch<RepetitionType>[];
  count: number;
}

export interface SequentialReport {
  hasSequential: boolean;
  details: PatternMatch<SequentialType>[];
  count: number;
}

export interface DictionaryMatch {
  type: 'dictionary_word';
  word: string;
  position: number;
  severity: 'high';
}

export interface DictionaryReport {
  hasDictionaryWords: boolean;
  words: DictionaryMatch[];
  count: number;
}

export type RiskLevel = 'none' | 'low' | 'medium' | 'high' | 'critical';

export interface RiskScore {
  score: number;  // 0..100
  level: RiskLevel;
}

export interface PatternReport {
  repetitions: RepetitionReport;
  sequential: SequentialReport;
  dictionary: DictionaryReport;
  overallRisk: RiskScore;
}

export const KEYBOARD_PATTERNS = [
  'qwerty', 'asdfgh', 'zxcvbn', 'qazwsx', '123456', '654321',
];

export const COMMON_WORDS = [
  'password', 'admin', 'user', 'login', 'guest', 'welcome',
  'monkey', 'dragon', 'master', 'shadow', 'qwerty', 'letmein',
  'trustno1', 'starwars', 'baseball', 'princess', 'football',
];

const CLASS_RUNS: Array<{ re: RegExp; type: SequentialType }> = [
  { re: /[a-z]{3,}/g, type: 'lowercase_sequential' },
  { re: /[A-Z]{3,}/g, type: 'uppercase_sequential' },
  { re: /[0-9]{3,}/g, type: 'digit_sequential' },
];

const RISK_WEIGHTS = {
  repetition: { high: 25, medium: 15 },
  sequential: { high: 20, medium: 12 },
  dictionary: 30,
} as const;

const RISK_COLORS: Record<RiskLevel, string> = {
  critical: '#dc2626',
  high:     '#f59e0b',
  medium:   '#eab308',
  low:      '#16a34a',
  none:     '#16a34a',
};

// ─── повторы ────────────────────────────────────────────────────────────────

function scan<T extends string>(
  password: string, re: RegExp, type: T, severity: Severity,
): PatternMatch<T>[] {
  return [...password.matchAll(re)].map(m => ({
    type,
    pattern: m[0],
    position: m.index ?? 0,
    severity,
  }));
}

export function detectRepetitions(password: string): RepetitionReport {
  const details: PatternMatch<RepetitionType>[] = [
    // aaa, 1111
    ...scan(password, /(.)\1{2,}/gu, 'consecutive', 'high'),
    // abab, 123123
    ...scan(password, /(.{2,})\1/gu, 'sequence_repeat', 'medium'),
  ];
  return { hasRepetitions: details.length > 0, details, count: details.length };
}

// ─── последовательности ─────────────────────────────────────────────────────

/** Every neighbour is exactly one code point above the previous one. */
export function isSequential(text: string): boolean {
  if (text.length < 3) return false;
  for (let i = 0; i < text.length - 1; i++) {
    if (text.charCodeAt(i + 1) - text.charCodeAt(i) !== 1) return false;
  }
  return true;
}

export function detectSequentialPatterns(password: string): SequentialReport {
  const details: PatternMatch<SequentialType>[] = [];

  for (const { re, type } of CLASS_RUNS) {
    for (const m of password.matchAll(re)) {
      if (isSequential(m[0])) {
        details.push({ type, pattern: m[0], position: m.index ?? 0, severity: 'medium' });
      }
    }
  }

  const lower = password.toLowerCase();
  for (const kp of KEYBOARD_PATTERNS) {
    const position = lower.indexOf(kp);
    if (position !== -1) {
      details.push({ type: 'keyboard_pattern', pattern: kp, position, severity: 'high' });
    }
  }

  return { hasSequential: details.length > 0, details, count: details.length };
}

// ─── словарь ────────────────────────────────────────────────────────────────

export function detectDictionaryWords(password: string): DictionaryReport {
  const lower = password.toLowerCase();
  const words: DictionaryMatch[] = [];

  for (const word of COMMON_WORDS) {
    const position = lower.indexOf(word);
    if (position !== -1) words.push({ type: 'dictionary_word', word, position, severity: 'high' });
  }

  return { hasDictionaryWords: words.length > 0, words, count: words.length };
}

// ─── итоговый риск ──────────────────────────────────────────────────────────

export function riskLevelForScore(score: number): RiskLevel {
  if (score >= 70) return 'critical';
  if (score >= 50) return 'high';
  if (score >= 30) return 'medium';
  if (score > 0)   return 'low';
  return 'none';
}

export function riskColor(level: RiskLevel): string {
  return RISK_COLORS[level];
}

function aggregateRisk(
  repetitions: RepetitionReport,
  sequential: SequentialReport,
  dictionary: DictionaryReport,
): RiskScore {
  let score = 0;
  for (const d of repetitions.details) score += RISK_WEIGHTS.repetition[d.severity];
  for (const d of sequential.details)  score += RISK_WEIGHTS.sequential[d.severity];
  score += dictionary.count * RISK_WEIGHTS.dictionary;

  score = Math.min(100, score);
  return { score, level: riskLevelForScore(score) };
}

export function calculateRiskScore(password: string): RiskScore {
  return aggregateRisk(
    detectRepetitions(password),
    detectSequentialPatterns(password),
    detectDictionaryWords(password),
  );
}

export function getRiskLevel(password: string): RiskLevel {
  return calculateRiskScore(password).level;
}

export function getPatternReport(password: string): PatternReport {
  const repetitions = detectRepetitions(password);
  const sequential  = detectSequentialPatterns(password);
  const dictionary  = detectDictionaryWords(password);

  return {
    repetitions,
    sequential,
    dictionary,
    overallRisk: aggregateRisk(repetitions, sequential, dictionary),
  };
}
