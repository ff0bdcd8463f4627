import {ScanSummary} from './scanner';

export function formatScanReport(summary: ScanSummary): string {
  const lines: string[] = [
    '='.repeat(50),
    'Scan completed!',
    `Items processed: ${summary.itemsProcessed}`
  ];

  if (summary.namesFixed.length > 0) {
    lines.push('', `Fixed ${summary.namesFixed.length} name(s):`);
    for (const {originalPath, newPath} of summary.namesFixed) {
      lines.push(`  ${originalPath} -> ${newPath}`);
    }
  }

  if (summary.contentsFixed.length > 0) {
    lines.push('', `Fixed ${summary.contentsFixed.length} content encoding(s):`);
    for (const {path, fromEncoding, toEncoding} of summary.contentsFixed) {
      lines.push(`  ${path}: ${fromEncoding} -> ${toEncoding}`);
    }
  }

  if (summary.skippedDirectories.length > 0) {
    lines.push('', `Skipped ${summary.skippedDirectories.length} unreadable director(ies):`);
    summary.skippedDirectories.forEach(path => lines.push(`  ${path}`));
  }

  if (summary.namesFixed.length === 0 && summary.contentsFixed.length === 0) {
    lines.push('', 'No encoding issues found!');
  }

  return lines.join('\n');
}
