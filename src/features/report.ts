import type { HistoryEntry } from './history';
import type { PatternReport } from './patterns';
import type { ComparisonResult, DetailedAnalysis, StrengthResult } from './strength';

// Текстовые отчёты для чата и для неинтерактивного режима

export function strengthBar(score: number, total = 5): string {
  return '█'.repeat(score) + '░'.repeat(total - score);
}

export function formatStrength(result: StrengthResult): string[] {
  const lines = [
    `Strength:  [${strengthBar(result.score, result.totalRules)}]  ` +
      `${result.score}/${result.totalRules} · ${result.level} (${result.percentage}%)`,
  ];
  if (result.tips.length === 0) lines.push('Strong password!');
  else lines.push('Tips:', ...result.tips.map(t => '  • ' + t));
  return lines;
}

export function formatPatternReport(report: PatternReport): string[] {
  const { repetitions, sequential, dictionary, overallRisk } = report;
  const lines = [`Pattern risk: ${overallRisk.level.toUpperCase()} (${overallRisk.score}/100)`];

  const counts = [
    repetitions.hasRepetitions     ? `Repetitions: ${repetitions.count}` : '',
    sequential.hasSequential       ? `Sequential: ${sequential.count}`   : '',
    dictionary.hasDictionaryWords  ? `Dictionary words: ${dictionary.count}` : '',
  ].filter(Boolean);
  if (counts.length > 0) lines.push(counts.join('  ·  '));

  for (const d of repetitions.details) {
    lines.push(`  • ${d.type} "${d.pattern}" at ${d.position} (${d.severity})`);
  }
  for (const d of sequential.details) {
    lines.push(`  • ${d.type} "${d.pattern}" at ${d.position} (${d.severity})`);
  }
  for (const w of dictionary.words) {
    lines.push(`  • dictionary_word "${w.word}" at ${w.position} (${w.severity})`);
  }
  return lines;
}

export function formatAnalysis(password: string, strength: StrengthResult, patterns: PatternReport): string {
  return [
    `Password:  ${password}`,
    ...formatStrength(strength),
    '',
    ...formatPatternReport(patterns),
  ].join('\n');
}

export function formatDetails(password: string, a: DetailedAnalysis): string {
  const yn = (b: boolean) => (b ? 'yes' : 'no');
  return [
    `Password:      ${password}`,
    `Length:        ${a.length}  (${a.uniqueChars} unique)`,
    `Lowercase:     ${yn(a.hasLowercase)}  (${a.lowercaseCount})`,
    `Uppercase:     ${yn(a.hasUppercase)}  (${a.uppercaseCount})`,
    `Digits:        ${yn(a.hasDigits)}  (${a.digitCount})`,
    `Symbols:       ${yn(a.hasSymbols)}  (${a.symbolCount})`,
    `Whitespace:    ${yn(a.hasSpaces)}`,
  ].join('\n');
}

export function formatComparison(a: string, b: string, cmp: ComparisonResult): string {
  const verdict =
    cmp.winner === 'tie' ? 'Tie' :
    cmp.winner === 'first' ? `Stronger: ${a}` : `Stronger: ${b}`;
  return [
    `1. ${a}  ${cmp.first.score}/5 · ${cmp.first.level}`,
    `2. ${b}  ${cmp.second.score}/5 · ${cmp.second.level}`,
    verdict,
  ].join('\n');
}

/** `2026-10-19T08:30:12.000Z` → `2026-10-19 08:30` */
export function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

export function formatHistory(entries: HistoryEntry[]): string {
  if (entries.length === 0) return 'No passwords in history yet.';
  return entries
    .map((e, i) => `  ${String(i + 1).padStart(2)}.  ${e.password}  (${e.strength})  ${shortTimestamp(e.timestamp)}`)
    .join('\n');
}
