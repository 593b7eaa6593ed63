import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { BUILTIN_ACTION_MODULES } from '../actions/index.js';
import type { ActionModuleLoader } from '../actions/index.js';
import { isActionDefinition, isActionModule } from '../actions/types.js';
import type { ActionDefinition, ActionTable } from '../actions/types.js';
import { hasPathEscape } from '../validation.js';

import { BridgeError, getErrorMessage } from './errors.js';

export interface ActionModuleHandle {
  name: string;
  origin: 'builtin' | 'reload';
  actions: ActionTable;
}

export type ModuleImporter = (url: string) => Promise<unknown>;

export interface ActionRegistryOptions {
  modules?: Record<string, ActionModuleLoader>;
  /**
   * Directory of compiled action modules (`<name>.js` / `<name>.mjs`).
   * Modules found here shadow built-ins and are re-imported whenever the
   * file changes on disk.
   */
  reloadDirectory?: string;
  importModule?: ModuleImporter;
  logDebug?: (message: string) => void;
}

const RELOAD_EXTENSIONS = ['.js', '.mjs'];
const MODULE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const defaultImporter: ModuleImporter = async (url) => await import(url);

export class ActionRegistry {
  private readonly modules: Map<string, ActionModuleLoader>;
  private readonly reloadDirectory?: string;
  private readonly importModule: ModuleImporter;
  private readonly logDebug: (message: string) => void;

  constructor(options: ActionRegistryOptions = {}) {
    this.modules = new Map(
      Object.entries(options.modules ?? BUILTIN_ACTION_MODULES),
    );
    this.reloadDirectory = options.reloadDirectory
      ? path.resolve(options.reloadDirectory)
      : undefined;
    this.importModule = options.importModule ?? defaultImporter;
    this.logDebug = options.logDebug ?? (() => undefined);
  }

  async listModules(): Promise<string[]> {
    const names = new Set(this.modules.keys());
    for (const name of (await this.listReloadFiles()).keys()) names.add(name);
    return [...names].sort();
  }

  /**
   * Resolves a namespace. Runs the module loader on every call, so an edited
   * file in the reload directory is picked up by the next request.
   */
  async resolve(moduleName: string): Promise<ActionModuleHandle> {
    if (hasPathEscape(moduleName)) {
      throw new BridgeError(
        'ModuleNotFoundError',
        `Invalid module name: ${moduleName}. Contains restricted characters.`,
      );
    }
    if (moduleName.trim().length === 0) {
      throw new BridgeError('ModuleNotFoundError', 'Module name is empty.');
    }
    if (!MODULE_NAME_PATTERN.test(moduleName)) {
      throw new BridgeError(
        'ModuleNotFoundError',
        `Invalid module name: ${moduleName}. Expected letters, digits and underscores.`,
      );
    }

    const reloadFile = (await this.listReloadFiles()).get(moduleName);
    if (reloadFile) return await this.loadFromFile(moduleName, reloadFile);

    const loader = this.modules.get(moduleName);
    if (!loader) {
      throw new BridgeError(
        'ModuleNotFoundError',
        `Could not import module '${moduleName}'. Ensure it is registered with the bridge.`,
      );
    }

    let loaded: unknown;
    try {
      loaded = await loader();
    } catch (error) {
      throw loadError(moduleName, error);
    }
    return toHandle(moduleName, 'builtin', loaded);
  }

  getCallable(handle: ActionModuleHandle, functionName: string): ActionDefinition {
    const { actions } = handle;
    const candidate =
      !functionName.startsWith('_') &&
      Object.prototype.hasOwnProperty.call(actions, functionName)
        ? actions[functionName]
        : undefined;

    if (!isActionDefinition(candidate)) {
      throw new BridgeError(
        'FunctionNotFoundError',
        `Function '${functionName}' not found in module '${handle.name}'.`,
      );
    }
    return candidate;
  }

  private async listReloadFiles(): Promise<Map<string, string>> {
    const found = new Map<string, string>();
    if (!this.reloadDirectory) return found;

    let entries: string[];
    try {
      entries = await readdir(this.reloadDirectory);
    } catch (error) {
      this.logDebug(
        `Reload directory unavailable (${this.reloadDirectory}): ${getErrorMessage(error)}`,
      );
      return found;
    }

    for (const entry of entries.sort()) {
      const ext = path.extname(entry);
      if (!RELOAD_EXTENSIONS.includes(ext)) continue;
      const name = entry.slice(0, -ext.length);
      if (!MODULE_NAME_PATTERN.test(name)) continue;
      if (!found.has(name))
        found.set(name, path.join(this.reloadDirectory, entry));
    }
    return found;
  }

  private async loadFromFile(
    moduleName: string,
    filePath: string,
  ): Promise<ActionModuleHandle> {
    let loaded: unknown;
    try {
      const info = await stat(filePath);
      // The query string changes with the file, which makes the ESM loader
      // evaluate the edited source instead of returning its cached copy.
      const url = `${pathToFileURL(filePath).href}?v=${info.mtimeMs}-${info.size}`;
      this.logDebug(`Loading action module ${moduleName} from ${url}`);
      loaded = await this.importModule(url);
    } catch (error) {
      throw loadError(moduleName, error);
    }
    return toHandle(moduleName, 'reload', loaded);
  }
}

function loadError(moduleName: string, error: unknown): BridgeError {
  return new BridgeError(
    'ModuleLoadError',
    `Failed to load module '${moduleName}': ${getErrorMessage(error)}`,
    error instanceof Error && error.stack ? { traceback: error.stack } : undefined,
  );
}

function toHandle(
  moduleName: string,
  origin: ActionModuleHandle['origin'],
  loaded: unknown,
): ActionModuleHandle {
  if (!isActionModule(loaded)) {
    throw new BridgeError(
      'ModuleLoadError',
      `Module '${moduleName}' does not export an actions table.`,
    );
  }
  return { name: moduleName, origin, actions: loaded.actions };
}
