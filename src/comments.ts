'use strict';

import type { IssueSuggestion, PullRequestAnalysis, RequirementGap } from './analysis';
import { COMMAND_NAMES } from './commands';
import { toSha256 } from './core/utils';
import type { CommandName, CommandRejection, Finding, MergedPullRequest } from './types';

const MARKER_NAMESPACE = 'repo-steward';

export const WELCOME_COMMENT_KEY = 'welcome';

/** Hidden marker embedded in every bot comment; prior posts are found by searching for it. */
export function commentMarker(key: string): string {
  return `<!-- ${MARKER_NAMESPACE}:${key} -->`;
}

export const JOKES: readonly string[] = [
  'Why do programmers prefer dark mode? Because light attracts bugs! 🐛',
  "How many programmers does it take to change a light bulb? None, that's a hardware problem! 💡",
  "Why do Java developers wear glasses? Because they don't C# 👓",
  "There are only 10 types of people: those who understand binary and those who don't 🤖",
  "A SQL query walks into a bar, walks up to two tables and asks: 'Can I join you?' 🍺",
  "Why did the programmer quit their job? They didn't get arrays! 📊",
];

export const MOTIVATIONAL_QUOTES: readonly string[] = [
  "Code is like humor. When you have to explain it, it's bad. 💭",
  'First, solve the problem. Then, write the code. 🎯',
  'The best error message is the one that never shows up. ✨',
  "Programming isn't about what you know; it's about what you can figure out. 🧠",
  'Clean code always looks like it was written by someone who cares. 💎',
  'Any fool can write code that a computer can understand. Good programmers write code that humans can understand. 👥',
];

/** Same seed, same entry: a redelivered command always gets the same reply. */
export function pickFromPool(pool: readonly string[], seed: string): string {
  if (pool.length === 0) {
    throw new Error('Cannot pick from an empty content pool.');
  }

  const index = Number.parseInt(toSha256(seed).slice(0, 8), 16) % pool.length;
  return pool[index];
}

const COMMAND_USAGE: Record<CommandName, string> = {
  help: '`/help` - Show this command reference',
  assign: '`/assign @user` - Assign the issue or pull request to a user',
  label: '`/label <name>` - Add a label',
  close: '`/close` - Close the issue or pull request',
  reopen: '`/reopen` - Reopen the issue or pull request',
  changelog: '`/changelog` - List recently merged pull requests',
  joke: '`/joke` - Programming humor',
  motivate: '`/motivate` - A little inspiration',
};

const HELP_SECTIONS: ReadonlyArray<{ title: string; commands: readonly CommandName[] }> = [
  { title: 'Management', commands: ['assign', 'label', 'close', 'reopen'] },
  { title: 'Info', commands: ['changelog', 'help'] },
  { title: 'Fun', commands: ['joke', 'motivate'] },
];

export function buildHelpComment(): string {
  const lines = ['🤖 **Available Commands:**'];
  for (const section of HELP_SECTIONS) {
    lines.push('', `**${section.title}:**`);
    for (const command of section.commands) {
      lines.push(`- ${COMMAND_USAGE[command]}`);
    }
  }

  return lines.join('\n');
}

export function buildRejectionComment(rejection: CommandRejection): string {
  const known = COMMAND_NAMES.find((name) => name === rejection.name);
  if (rejection.reason === 'invalid-arguments' && known) {
    return `⚠️ I couldn't run \`/${known}\` with those arguments. Usage: ${COMMAND_USAGE[known]}`;
  }

  return [`🤔 \`/${rejection.name}\` isn't a command I know.`, '', buildHelpComment()].join('\n');
}

export function buildWelcomeSection(author: string): string {
  return [
    commentMarker(WELCOME_COMMENT_KEY),
    `🎉 Welcome @${author}! Thanks for your first contribution!`,
    '',
    '📋 **Quick checklist:**',
    '- [ ] Tests added/updated',
    '- [ ] Documentation updated',
    '- [ ] Code follows project style',
    '',
    '💡 Use `/help` for available commands. Thanks for contributing! 🚀',
  ].join('\n');
}

const LISTED_FILES_LIMIT = 3;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function buildAnalysisSection(analysis: PullRequestAnalysis): string {
  const { complexity } = analysis;
  const lines = [
    '📊 **PR Analysis:**',
    '',
    `- **Files changed:** ${complexity.fileCount}`,
    `- **Lines changed:** ${complexity.totalLines}`,
    `- **Complexity:** ${capitalize(complexity.riskLevel)}`,
  ];

  if (analysis.breakingFiles.length > 0) {
    lines.push(
      `- ⚠️ **Potential breaking changes in:** ${analysis.breakingFiles.slice(0, LISTED_FILES_LIMIT).join(', ')}`,
    );
  }
  if (analysis.languages.length > 0) {
    lines.push(`- **Languages:** ${analysis.languages.join(', ')}`);
  }

  return lines.join('\n');
}

function describeGap(gap: RequirementGap): string {
  switch (gap.kind) {
    case 'missing-tests':
      return '⚠️ Consider adding tests for your code changes';
    case 'large-files':
      return `📏 Large files detected: ${gap.files.slice(0, LISTED_FILES_LIMIT).join(', ')} - consider splitting`;
    case 'missing-docs':
      return '📚 Consider updating documentation for this change';
  }
}

export function buildRequirementsSection(gaps: readonly RequirementGap[]): string {
  return ['🤖 **Automated PR Review:**', '', ...gaps.map((gap) => `- ${describeGap(gap)}`)].join('\n');
}

const ISSUE_SUGGESTION_TEXT: Record<IssueSuggestion, string> = {
  'more-detail': 'Consider providing more details about the issue',
  'reproduction-steps': 'For bug reports, please include steps to reproduce',
  'use-case': 'For feature requests, please explain the use case',
};

export function buildIssueSuggestionsComment(suggestions: readonly IssueSuggestion[]): string {
  return [
    '📝 **Suggestions to improve this issue:**',
    '',
    ...suggestions.map((suggestion) => `- ${ISSUE_SUGGESTION_TEXT[suggestion]}`),
  ].join('\n');
}

const SECURITY_CATEGORY_TITLES: Record<string, string> = {
  'hardcoded-credential': 'Hardcoded credential',
  'dangerous-call': 'Dangerous call',
  'sql-injection-risk': 'SQL injection risk',
};

export function buildSecuritySection(findings: readonly Finding[]): string {
  const lines = ['🔒 **Security Scan Results:**', ''];

  for (const finding of findings) {
    const icon = finding.severity === 'critical' ? '🚨' : '⚠️';
    const title = SECURITY_CATEGORY_TITLES[finding.value] ?? finding.value;
    const location = finding.file ? ` in \`${finding.file}\`` : '';
    lines.push(`- ${icon} **${title}**${location}`);
    if (finding.evidence) {
      lines.push(`  \`${finding.evidence.replace(/`/g, "'")}\``);
    }
  }

  lines.push(
    '',
    '💡 Please review these potential issues before merging. This scan is pattern-based and can report false positives.',
  );
  return lines.join('\n');
}

export function buildChangelogComment(merges: readonly MergedPullRequest[]): string {
  if (merges.length === 0) {
    return '# Recent Changes\n\nNo recently merged pull requests.';
  }

  const entries = merges.map((merge) => `- ${merge.title} (#${merge.number}) by @${merge.author}`);
  return ['# Recent Changes', '', ...entries].join('\n');
}

export function buildMergedThanksComment(author: string): string {
  return `🎉 Thanks @${author}! Your contribution has been merged. Great work! 🚀`;
}
