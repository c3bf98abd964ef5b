import fs from 'node:fs/promises';
import path from 'node:path';
import { SnapshotIoError } from '../errors.js';
import type { Frame } from '../types.js';
import { encodePngFrame } from './utils.js';

export const DEFAULT_SNAPSHOT_DIRECTORY = 'pics';
const MAX_COLLISION_SUFFIX = 1000;

export interface SnapshotSink {
  save(frame: Frame, ts: number): Promise<string>;
}

export class SnapshotStore implements SnapshotSink {
  readonly directory: string;

  constructor(options: { directory?: string } = {}) {
    this.directory = options.directory ?? DEFAULT_SNAPSHOT_DIRECTORY;
  }

  async save(frame: Frame, ts: number): Promise<string> {
    const base = formatSnapshotName(new Date(ts));
    let png: Buffer;

    try {
      png = encodePngFrame(frame);
      await fs.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new SnapshotIoError(path.join(this.directory, `${base}.png`), { cause: error });
    }

    for (let attempt = 0; attempt <= MAX_COLLISION_SUFFIX; attempt += 1) {
      const fileName = attempt === 0 ? `${base}.png` : `${base}-${attempt}.png`;
      const target = path.join(this.directory, fileName);
      try {
        await fs.writeFile(target, png, { flag: 'wx' });
        return target;
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          continue;
        }
        throw new SnapshotIoError(target, { cause: error });
      }
    }

    throw new SnapshotIoError(path.join(this.directory, `${base}.png`), {
      cause: new Error(`more than ${MAX_COLLISION_SUFFIX} snapshots within one second`)
    });
  }
}

/** `motion_YYYYMMDD_HHMMSS`, local time. */
export function formatSnapshotName(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `motion_${day}_${time}`;
}
