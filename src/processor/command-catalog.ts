import fs from 'node:fs/promises';
import path from 'node:path';

const COMMAND_EXT = '.md';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Slash commands available to the processor, one markdown file per command.
 * Subdirectories become namespaces: `ops/daily/digest.md` is `ops:daily:digest`.
 */
export class CommandCatalog {
  constructor(readonly root: string) {}

  static forWorkspace(workspaceCwd: string): CommandCatalog {
    return new CommandCatalog(path.join(workspaceCwd, '.claude', 'commands'));
  }

  /** File backing `name`, or null when the name cannot map to a catalog entry. */
  resolve(name: string): string | null {
    const segments = name.split(':');
    for (const segment of segments) {
      if (!segment || segment === '.' || segment === '..' || /[\\/]/.test(segment)) return null;
    }
    const last = segments[segments.length - 1];
    if (!last) return null;
    return path.join(this.root, ...segments.slice(0, -1), last + COMMAND_EXT);
  }

  async has(name: string): Promise<boolean> {
    const file = this.resolve(name);
    if (!file) return false;
    try {
      return (await fs.stat(file)).isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }
}
