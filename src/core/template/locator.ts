/**
 * Template lookup: identifier → directory, through ordered search paths.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Config } from '../config/schema.js';
import { ConfigError, ErrorCodes, SecurityError } from '../../utils/errors.js';
import { globFiles, isDirectory } from '../../utils/file-system.js';

export const TEMPLATE_FILE = 'template.yaml';

/** Templates shipped with blueprint. */
export const BUILTIN_TEMPLATES_DIR = fileURLToPath(new URL('../../../templates', import.meta.url));

export interface TemplateLocator {
  locate(templateId: string): Promise<string>;
}

const TEMPLATE_ID_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

function assertTemplateId(templateId: string): void {
  if (!TEMPLATE_ID_PATTERN.test(templateId) || templateId.includes('..')) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Invalid template name: ${templateId}`,
      { templateId }
    );
  }
}

export class DirectoryTemplateLocator implements TemplateLocator {
  private readonly searchPaths: readonly string[];

  constructor(searchPaths: readonly string[]) {
    if (searchPaths.length === 0) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'No template search paths configured');
    }
    this.searchPaths = [...searchPaths];
  }

  getSearchPaths(): readonly string[] {
    return this.searchPaths;
  }

  /**
   * First search path with a matching directory wins. When none has one, the
   * candidate under the first search path is returned and the caller reports
   * the missing template.
   */
  async locate(templateId: string): Promise<string> {
    assertTemplateId(templateId);
    for (const searchPath of this.searchPaths) {
      const candidate = path.join(searchPath, templateId);
      if (await isDirectory(candidate)) {
        return candidate;
      }
    }
    return path.join(this.searchPaths[0] ?? '', templateId);
  }

  /** Identifiers of every directory that holds a template.yaml, sorted. */
  async list(): Promise<string[]> {
    const ids = new Set<string>();
    for (const searchPath of this.searchPaths) {
      if (!(await isDirectory(searchPath))) continue;
      const files = await globFiles(`*/${TEMPLATE_FILE}`, { cwd: searchPath });
      for (const file of files) {
        ids.add(file.split('/')[0] ?? file);
      }
    }
    return [...ids].sort();
  }
}

function expandHome(searchPath: string): string {
  if (searchPath === '~') return os.homedir();
  if (searchPath.startsWith('~/')) return path.join(os.homedir(), searchPath.slice(2));
  return searchPath;
}

/**
 * Locator over the configured search paths (relative ones resolved against
 * `projectRoot`), followed by the built-in templates when enabled.
 */
export function createTemplateLocator(config: Config, projectRoot: string): DirectoryTemplateLocator {
  const searchPaths = config.templates.search_paths.map((searchPath) =>
    path.resolve(projectRoot, expandHome(searchPath))
  );
  if (config.templates.include_builtin) {
    searchPaths.push(BUILTIN_TEMPLATES_DIR);
  }
  return new DirectoryTemplateLocator(searchPaths);
}
