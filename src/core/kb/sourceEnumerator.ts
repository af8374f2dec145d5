import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import {
  errorCode,
  fileExists,
  listFilesRecursive,
  readFileIfExists,
} from '../../utils/fileUtils.js';
import { toPosixPath } from '../../utils/helpers.js';
import type { KnowledgeBaseSettings } from './types.js';

type EnumeratorSettings = Pick<
  KnowledgeBaseSettings,
  'sourcesDir' | 'linksFilePath' | 'cachePath' | 'indexPath'
>;

/** Parses link-list text: one URL per line, `#` starts a comment line. */
export function parseLinkList(content: string): string[] {
  const seen = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const url = line.trim();
    if (url && !url.startsWith('#')) {
      seen.add(url);
    }
  }
  return Array.from(seen);
}

/**
 * Snapshot views of the current sources. Never reads or writes the cache.
 */
export class SourceEnumerator {
  private readonly sourcesDir: string;
  private readonly excluded: Set<string>;

  constructor(private readonly settings: EnumeratorSettings) {
    this.sourcesDir = path.resolve(settings.sourcesDir);
    // Artifacts (and the update lock directory) may live inside the source
    // root; they are never sources.
    this.excluded = new Set(
      [
        settings.linksFilePath,
        settings.cachePath,
        `${settings.cachePath}.lock`,
        settings.indexPath,
      ].map((p) => path.resolve(p))
    );
  }

  public get root(): string {
    return this.sourcesDir;
  }

  public async listFiles(): Promise<string[]> {
    if (!(await fileExists(this.sourcesDir))) {
      console.warn(`Sources directory not found: ${this.sourcesDir}`);
      return [];
    }
    const files = await listFilesRecursive(
      this.sourcesDir,
      (name, absolutePath) => this.isIgnored(name, absolutePath)
    );
    return files.map(toPosixPath).sort();
  }

  public async listUrls(): Promise<string[]> {
    const content = await readFileIfExists(this.settings.linksFilePath);
    if (content === null) {
      return [];
    }
    return parseLinkList(content);
  }

  public resolveFile(relPath: string): string {
    return path.join(this.sourcesDir, ...relPath.split('/'));
  }

  /** Converts an absolute path under the root to a source identifier. */
  public toSourceId(absolutePath: string): string | null {
    const rel = path.relative(this.sourcesDir, path.resolve(absolutePath));
    if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) {
      return null;
    }
    return toPosixPath(rel);
  }

  /** Whether `relPath` would currently be listed by {@link listFiles}. */
  public async isFileSource(relPath: string): Promise<boolean> {
    const segments = relPath.split('/');
    let current = this.sourcesDir;
    for (const segment of segments) {
      current = path.join(current, segment);
      if (this.isIgnored(segment, current)) return false;
    }
    try {
      const stats = await fsp.stat(current);
      return stats.isFile();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return false;
      throw error;
    }
  }

  /** Dotfiles and the knowledge-base artifacts; watchers skip these too. */
  public isIgnoredPath(absolutePath: string): boolean {
    const resolved = path.resolve(absolutePath);
    return this.isIgnored(path.basename(resolved), resolved);
  }

  private isIgnored(name: string, absolutePath: string): boolean {
    return name.startsWith('.') || this.excluded.has(absolutePath);
  }
}
