/**
 * Validation Issue Formatter
 *
 * Renders validation results for people fixing an uploaded file.
 */

import type { ComparisonSummary, SerializedIssue, ValidationIssue } from '../types/index.js';
import { humanizeKey, listWithOverflow } from './utils.js';

/** Issues listed per issue type */
const ISSUES_PER_TYPE = 3;

/**
 * Validation analysis grouped by issue type, with next steps
 */
export function formatValidationAnalysis(summary: ComparisonSummary): string {
  const lines: string[] = [];

  lines.push(`## Validation Analysis for ${summary.platform.toUpperCase()} Campaigns`);
  lines.push('');

  if (summary.totalIssues === 0) {
    lines.push(`All ${summary.totalCampaigns} campaigns match the expected schema.`);
    return lines.join('\n');
  }

  lines.push(`Found ${summary.totalIssues} validation issues that need attention.`);
  lines.push('');

  const byType = new Map<string, SerializedIssue[]>();
  for (const issue of summary.validationIssues) {
    const list = byType.get(issue.issueType) ?? [];
    list.push(issue);
    byType.set(issue.issueType, list);
  }

  lines.push('### Issues by Type');
  lines.push('');
  for (const [issueType, issues] of byType) {
    lines.push(`**${humanizeKey(issueType)}** (${issues.length} issues):`);
    lines.push(
      ...listWithOverflow(
        issues.map((issue) => `Campaign #${issue.campaignNumber}: ${issue.description}`),
        ISSUES_PER_TYPE
      )
    );
    lines.push('');
  }

  lines.push('### Recommended Actions');
  lines.push('1. Review the expected schema requirements');
  lines.push('2. Fix the issues mentioned above');
  lines.push('3. Re-upload your corrected file');
  lines.push('4. Or proceed with valid campaigns if any exist');

  return lines.join('\n');
}

/**
 * Short fix hints derived from the kinds of issues present
 */
export function formatQuickFixes(issues: readonly ValidationIssue[]): string {
  const fixes: string[] = [];

  const missing = Array.from(
    new Set(
      issues.filter((i) => i.issueType === 'missing_required_field').map((i) => i.fieldPath)
    )
  );
  if (missing.length > 0) {
    fixes.push(`- Add missing required fields: ${missing.join(', ')}`);
  }

  if (issues.some((i) => i.issueType === 'type_mismatch')) {
    fixes.push('- Fix data type mismatches: numbers must not be quoted');
  }

  if (issues.some((i) => i.issueType === 'value_too_small' || i.issueType === 'value_too_large')) {
    fixes.push('- Check value ranges: budgets must lie within the allowed bounds');
  }

  if (issues.some((i) => i.issueType === 'invalid_value')) {
    fixes.push('- Use one of the allowed values for enumerated fields');
  }

  if (issues.some((i) => i.issueType === 'unknown_field')) {
    fixes.push('- Remove or rename columns the platform does not know');
  }

  return fixes.length > 0 ? `**Quick Fixes:**\n${fixes.join('\n')}` : 'No specific fixes available.';
}
