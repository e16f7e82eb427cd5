import type { ElevationSample } from './types';
import { InsufficientDataError } from './errors';

/**
 * Reads `x, y, current[, target]` survey rows. Columns may be separated by
 * commas, semicolons or tabs; a leading header row is skipped. An empty
 * target column means no proposed grade at that shot.
 */
export function parseSamplesCsv(text: string): ElevationSample[] {
  const lines = text.trim().split(/\r?\n/);
  if (lines.length === 0 || lines[0].trim() === '') {
    throw new InsufficientDataError('CSV is empty');
  }

  const samples: ElevationSample[] = [];
  const startIdx = isHeaderRow(lines[0]) ? 1 : 0;

  for (let i = startIdx; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parts = line.split(/[,;\t]/).map(p => p.trim());
    if (parts.length < 3) {
      throw new InsufficientDataError(`Line ${i + 1}: expected at least 3 columns, got ${parts.length}`);
    }

    const [x, y, current] = parts.slice(0, 3).map(Number);
    if (!parts[0] || !parts[1] || !parts[2] || [x, y, current].some(v => !Number.isFinite(v))) {
      throw new InsufficientDataError(`Line ${i + 1}: non-numeric values found`);
    }

    const sample: ElevationSample = { x, y, current };
    const targetText = parts[3] ?? '';
    if (targetText !== '') {
      const target = Number(targetText);
      if (!Number.isFinite(target)) {
        throw new InsufficientDataError(`Line ${i + 1}: non-numeric target elevation`);
      }
      sample.target = target;
    }
    samples.push(sample);
  }

  if (samples.length < 3) {
    throw new InsufficientDataError(`Need at least 3 samples, got ${samples.length}`);
  }

  return samples;
}

function isHeaderRow(line: string): boolean {
  const parts = line.split(/[,;\t]/).slice(0, 3);
  return parts.some(p => p.trim() === '' || !Number.isFinite(Number(p.trim())));
}
