import { homedir, tmpdir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

export interface PathRoots {
  /** Directory `$out` expands to */
  outDir: string;
  /** Directory `$temp` expands to */
  tempDir: string;
  /** Base for relative paths */
  cwd: string;
}

export class PathResolver {
  /**
   * Get the project-local .stepwright directory
   */
  static getProjectDir(): string {
    return resolve(process.cwd(), '.stepwright');
  }

  /**
   * Get the XDG config directory
   * Priority: $XDG_CONFIG_HOME/stepwright or ~/.config/stepwright
   */
  static getUserConfigDir(): string {
    const xdgConfigHome = process.env.XDG_CONFIG_HOME;
    if (xdgConfigHome) {
      return join(xdgConfigHome, 'stepwright');
    }
    return join(homedir(), '.config', 'stepwright');
  }

  /**
   * Get potential configuration file paths in order of precedence
   */
  static getConfigPaths(): string[] {
    const paths: string[] = [];

    if (process.env.STEPWRIGHT_CONFIG) {
      paths.push(resolve(process.env.STEPWRIGHT_CONFIG));
    }

    const projectDir = PathResolver.getProjectDir();
    paths.push(join(projectDir, 'config.yaml'));
    paths.push(join(projectDir, 'config.yml'));

    const userConfigDir = PathResolver.getUserConfigDir();
    paths.push(join(userConfigDir, 'config.yaml'));
    paths.push(join(userConfigDir, 'config.yml'));

    return paths;
  }

  static defaultRoots(): PathRoots {
    return {
      outDir: join(PathResolver.getProjectDir(), 'out'),
      tempDir: join(tmpdir(), 'stepwright'),
      cwd: process.cwd(),
    };
  }

  /**
   * Expand `$out`, `$temp` and `~` prefixes and resolve relative paths against `roots.cwd`.
   */
  static expand(rawPath: string, roots: PathRoots): string {
    const trimmed = rawPath.trim();
    if (trimmed === '$out' || trimmed.startsWith('$out/')) {
      return join(roots.outDir, trimmed.slice('$out'.length));
    }
    if (trimmed === '$temp' || trimmed.startsWith('$temp/')) {
      return join(roots.tempDir, trimmed.slice('$temp'.length));
    }
    if (trimmed === '~' || trimmed.startsWith('~/')) {
      return join(homedir(), trimmed.slice(1));
    }
    return isAbsolute(trimmed) ? trimmed : resolve(roots.cwd, trimmed);
  }
}
