import type { ModsourceConfig } from '../config/index.js';
import { SearchPathRegistry } from './registry.js';
import { SearchPathTemplate } from './template.js';

/**
 * Default templates, in order: the user module directory (bare name, then
 * each extension), then the current directory the same way.
 */
export function defaultTemplates(
  config: Pick<ModsourceConfig, 'userModuleDir' | 'extensions'>
): SearchPathTemplate[] {
  const userDir = config.userModuleDir.endsWith('/')
    ? config.userModuleDir
    : `${config.userModuleDir}/`;

  const forDirectory = (dir: string): SearchPathTemplate[] => [
    new SearchPathTemplate(dir),
    ...config.extensions.map((ext) => new SearchPathTemplate(dir, ext)),
  ];

  return [...forDirectory(userDir), ...forDirectory('./')];
}

/**
 * Build the search path for a configuration: `extraSearchPath` entries first,
 * in the order given, then the defaults.
 */
export function defaultSearchPath(
  config: Pick<ModsourceConfig, 'userModuleDir' | 'extensions' | 'extraSearchPath'>
): SearchPathRegistry {
  return new SearchPathRegistry([...config.extraSearchPath, ...defaultTemplates(config)]);
}
