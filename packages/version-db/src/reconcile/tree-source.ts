/**
 * Port Tree Sources
 *
 * The reconciler identifies a port's checked-in contents by the git tree
 * object of its directory at HEAD. {@link PortTreeSource} hides where those
 * ids come from; {@link GitPortTreeSource} asks git, and tests supply a map.
 *
 * @module reconcile/tree-source
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { relative, sep } from 'node:path';
import { TreeSourceError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';

const execFileAsync = promisify(execFile);

export interface PortTreeSource {
  /**
   * Port name to git tree id, for every port directory committed at HEAD
   *
   * @throws TreeSourceError when the backend cannot be queried
   */
  getPortTreeMap(): Promise<Map<string, string>>;

  /**
   * Whether the port directory has uncommitted changes; `undefined` when
   * that cannot be determined
   */
  hasLocalChanges(port: string): Promise<boolean | undefined>;
}

/**
 * Parse `git ls-tree -d HEAD -- <prefix>/` output
 *
 * Lines look like `040000 tree <id>\tports/zlib`; anything that is not a
 * tree directly under `prefix` is ignored.
 */
export function parseLsTreeOutput(output: string, prefix: string): Map<string, string> {
  const base = prefix.endsWith('/') ? prefix : `${prefix}/`;
  const trees = new Map<string, string>();

  for (const line of output.split('\n')) {
    const tab = line.indexOf('\t');
    if (tab < 0) continue;

    const [, type, id] = line.slice(0, tab).split(' ');
    const path = line.slice(tab + 1);
    if (type !== 'tree' || id === undefined || !path.startsWith(base)) continue;

    const name = path.slice(base.length);
    if (name.length > 0 && !name.includes('/')) {
      trees.set(name, id);
    }
  }
  return trees;
}

export interface GitPortTreeSourceOptions {
  /** Repository root; git runs here */
  readonly root: string;
  /** Ports directory, inside `root` */
  readonly portsDir: string;
  readonly logger?: Logger;
  readonly gitExecutable?: string;
}

export class GitPortTreeSource implements PortTreeSource {
  private readonly prefix: string;
  private readonly logger: Logger;

  constructor(private readonly options: GitPortTreeSourceOptions) {
    this.prefix = relative(options.root, options.portsDir).split(sep).join('/');
    this.logger = options.logger ?? defaultLogger;
  }

  private async git(args: readonly string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.options.gitExecutable ?? 'git', [...args], {
      cwd: this.options.root,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
    });
    return stdout;
  }

  async getPortTreeMap(): Promise<Map<string, string>> {
    try {
      const output = await this.git(['ls-tree', '-d', 'HEAD', '--', `${this.prefix}/`]);
      return parseLsTreeOutput(output, this.prefix);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new TreeSourceError(`failed to list port trees under ${this.prefix}`, detail);
    }
  }

  async hasLocalChanges(port: string): Promise<boolean | undefined> {
    try {
      const output = await this.git(['status', '--porcelain', '--', `${this.prefix}/${port}`]);
      return output.trim().length > 0;
    } catch (error) {
      this.logger.debug('git status failed', {
        port,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}

/**
 * Tree source backed by a fixed map
 */
export class StaticPortTreeSource implements PortTreeSource {
  private readonly trees: Map<string, string>;

  constructor(
    trees: Iterable<readonly [string, string]>,
    private readonly changedPorts: ReadonlySet<string> = new Set()
  ) {
    this.trees = new Map(trees);
  }

  async getPortTreeMap(): Promise<Map<string, string>> {
    return new Map(this.trees);
  }

  async hasLocalChanges(port: string): Promise<boolean | undefined> {
    return this.changedPorts.has(port);
  }
}
