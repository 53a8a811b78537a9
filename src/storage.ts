import fs from 'node:fs';
import path from 'node:path';
import { LinkSet, Logger } from './types.js';
import { sortedLinks } from './utils.js';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

// Written beside the target and renamed over it, so readers never see a partial file.
export function writeJson(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  try {
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function readJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
}

export class LinkStore {
  constructor(
    private filePath: string,
    private logger: Logger = console
  ) {}

  load(): LinkSet {
    if (!fs.existsSync(this.filePath)) return new Set();

    let data: unknown;
    try {
      data = readJson(this.filePath);
    } catch (err) {
      this.logger.warn(`[state] could not load ${this.filePath}: ${describe(err)}`);
      return new Set();
    }

    if (Array.isArray(data)) {
      return new Set(data.filter((v): v is string => typeof v === 'string'));
    }
    if (data) {
      this.logger.warn(`[state] could not load ${this.filePath}: expected a JSON array`);
    }
    return new Set();
  }

  save(links: LinkSet) {
    writeJson(this.filePath, sortedLinks(links));
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
