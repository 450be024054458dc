/**
 * Trajectory persistence: two-column (time, position) text file.
 *
 * One row per sample, comma-space delimited, no header.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Trajectory } from '../engine/simulation';
import { formatScientific } from '../utils/formatNumber';

export const DELIMITER = ', ';

/** Render `time, position` rows, each terminated by a newline. */
export function formatTrajectoryRows(trajectory: Pick<Trajectory, 'time' | 'position'>): string {
  const { time, position } = trajectory;
  if (time.length !== position.length) {
    throw new Error(`time and position lengths differ (${time.length} vs ${position.length})`);
  }
  let out = '';
  for (let i = 0; i < time.length; i++) {
    out += formatScientific(time[i]) + DELIMITER + formatScientific(position[i]) + '\n';
  }
  return out;
}

/** Write the trajectory file, creating parent directories as needed. Returns the resolved path. */
export function writeTrajectoryFile(
  filePath: string,
  trajectory: Pick<Trajectory, 'time' | 'position'>,
): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, formatTrajectoryRows(trajectory), 'utf-8');
  return resolved;
}
