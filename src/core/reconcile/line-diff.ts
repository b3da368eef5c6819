import { structuredPatch } from 'diff';

/**
 * Unified diff of two texts with zero context lines. Returns '' when the texts
 * have the same lines.
 */
export function formatLineDiff(
  sourceText: string,
  destinationText: string,
  sourceLabel: string,
  destinationLabel: string
): string {
  const patch = structuredPatch(sourceLabel, destinationLabel, sourceText, destinationText, '', '', { context: 0 });
  if (patch.hunks.length === 0) {
    return '';
  }

  const lines = [`--- ${sourceLabel}`, `+++ ${destinationLabel}`];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    lines.push(...hunk.lines);
  }
  return lines.join('\n');
}

function formatRange(start: number, length: number): string {
  if (length === 1) {
    return `${start}`;
  }
  // An empty range names the line before it
  return length === 0 ? `${start - 1},0` : `${start},${length}`;
}
