/**
 * Markdown renderers for knowledge records.
 *
 * Full-detail renderers back the MCP resources; hit renderers are the shorter
 * blocks the search tools list. Absent fields render as a fixed default and
 * the label line stays, except for the sections noted per renderer.
 */

import type {
  BestPractice,
  GovernanceRule,
  KnowledgeEntry,
  Snippet,
  Tip,
  TroubleshootingGuide,
} from './types';

const joinTags = (tags: readonly string[] | undefined): string => (tags ?? []).join(', ');

const codeBlock = (language: string | undefined, code: string | undefined): string =>
  `\n\`\`\`${language ?? ''}\n${code ?? ''}\n\`\`\``;

export function formatBestPractice(item: BestPractice): string {
  return [
    `# ${item.title ?? ''}`,
    `\n**Category**: ${item.category ?? 'N/A'}`,
    `**Difficulty**: ${item.difficulty ?? 'N/A'}`,
    `\n**Description**: ${item.description ?? ''}`,
    `\n**Rationale**: ${item.rationale ?? ''}`,
    `\n**Good example**: ${item.example_good ?? ''}`,
    `**Bad example**: ${item.example_bad ?? ''}`,
    `\n**Tags**: ${joinTags(item.tags)}`,
  ].join('\n');
}

export function formatSnippet(item: Snippet): string {
  return [
    `# ${item.title ?? ''}`,
    `\n**Language**: ${item.language ?? 'unknown'}`,
    `**Use case**: ${item.use_case ?? ''}`,
    codeBlock(item.language, item.code),
    `\n**Explanation**: ${item.explanation ?? ''}`,
    `\n**Tags**: ${joinTags(item.tags)}`,
  ].join('\n');
}

/**
 * Symptoms, causes and steps are each omitted when the guide has none.
 */
export function formatTroubleshooting(item: TroubleshootingGuide): string {
  const lines = [`# ${item.title ?? ''}`];

  if (item.symptoms?.length) {
    lines.push('\n**Symptoms**:');
    for (const symptom of item.symptoms) {
      lines.push(`- ${symptom}`);
    }
  }

  if (item.causes?.length) {
    lines.push('\n**Possible causes**:');
    for (const cause of item.causes) {
      lines.push(`- ${cause}`);
    }
  }

  if (item.steps?.length) {
    lines.push('\n**Resolution steps**:');
    for (const step of item.steps) {
      lines.push(`\n**Step ${step.step ?? ''}**: ${step.action ?? ''}`);
      lines.push(`  ${step.details ?? ''}`);
    }
  }

  return lines.join('\n');
}

export function formatTip(item: Tip): string {
  const lines = [`# ${item.title ?? ''}`, `\n${item.tip ?? ''}`];
  if (item.why_it_matters) {
    lines.push(`\n*Why it matters*: ${item.why_it_matters}`);
  }
  lines.push(`\n**Tags**: ${joinTags(item.tags)}`);
  return lines.join('\n');
}

export function formatGovernance(item: GovernanceRule): string {
  const lines = [
    `# ${item.display_name ?? item.feature}`,
    `\n**Minimum zone required**: ${item.minimum_zone ?? 'unknown'}`,
    '\n**Availability by zone**:',
  ];

  for (const [zone, info] of Object.entries(item.zones ?? {})) {
    lines.push(`\n**${zone.toUpperCase()}**: ${info.available ? 'Available' : 'Not available'}`);
    if (info.reason) {
      lines.push(`  Reason: ${info.reason}`);
    }
    if (info.requirements?.length) {
      lines.push(`  Requirements: ${info.requirements.join(', ')}`);
    }
  }

  if (item.justification_template) {
    lines.push(`\n**Justification template**:\n> ${item.justification_template}`);
  }

  return lines.join('\n');
}

/**
 * Full-detail rendering of any tagged record
 */
export function formatEntry(entry: KnowledgeEntry): string {
  switch (entry.kind) {
    case 'best_practice':
      return formatBestPractice(entry.record);
    case 'snippet':
      return formatSnippet(entry.record);
    case 'troubleshooting':
      return formatTroubleshooting(entry.record);
    case 'tip':
      return formatTip(entry.record);
    case 'governance':
      return formatGovernance(entry.record);
  }
}

// ===== SEARCH HITS =====

/**
 * Numbered best-practice hit, as listed by `search_best_practices`
 */
export function formatBestPracticeHit(item: BestPractice, rank: number, uri: string): string {
  return [
    `\n## ${rank}. ${item.title ?? ''}`,
    `**Description**: ${item.description ?? ''}`,
    `**Rationale**: ${item.rationale ?? ''}`,
    `*Difficulty: ${item.difficulty ?? 'N/A'}*`,
    `Resource URI: ${uri}`,
  ].join('\n');
}

export function formatSnippetHit(item: Snippet, uri: string): string {
  return [
    `\n## ${item.title ?? ''}`,
    `**Language**: ${item.language ?? 'unknown'}`,
    `**Use case**: ${item.use_case ?? ''}`,
    codeBlock(item.language, item.code),
    `\n**Explanation**: ${item.explanation ?? ''}`,
    `Resource URI: ${uri}`,
  ].join('\n');
}

export function formatTipHit(item: Tip, uri: string): string {
  const lines = [`\n## ${item.title ?? ''}`, item.tip ?? ''];
  if (item.why_it_matters) {
    lines.push(`\n*Why it matters*: ${item.why_it_matters}`);
  }
  lines.push(`Resource URI: ${uri}`);
  return lines.join('\n');
}
