import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { LaunchEvent, LaunchEventStream } from '../../src/launcher/types.js';

export interface TempProject {
  dir: string;
  write(relativePath: string, content?: string): string;
  mkdir(relativePath: string): string;
  cleanup(): void;
}

export function createTempProject(): TempProject {
  const dir = mkdtempSync(join(tmpdir(), 'pylaunch-project-'));
  return {
    dir,
    write(relativePath, content = '') {
      const path = join(dir, relativePath);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content);
      return path;
    },
    mkdir(relativePath) {
      const path = join(dir, relativePath);
      mkdirSync(path, { recursive: true });
      return path;
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export async function collectEvents(stream: LaunchEventStream): Promise<LaunchEvent[]> {
  const events: LaunchEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}
