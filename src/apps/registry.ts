import os from 'os';
import path from 'path';
import type { AppDescriptor, FormatKind } from '../types/canonical.js';
import type { Config } from '../types/config.js';
import {
  getClaudeConfigPath,
  getCursorConfigPath,
  getRoocodeConfigPath,
  getVSCodeSettingsPath,
  getWindsurfConfigPath,
  type PlatformInfo,
} from './paths.js';

interface KnownApp {
  name: string;
  preferredFormat: FormatKind;
  defaultPath(info: PlatformInfo): string;
}

export const KNOWN_APPS: readonly KnownApp[] = [
  { name: 'Claude', preferredFormat: 'claude', defaultPath: getClaudeConfigPath },
  { name: 'VSCode', preferredFormat: 'vscode', defaultPath: getVSCodeSettingsPath },
  { name: 'Cursor', preferredFormat: 'standard', defaultPath: getCursorConfigPath },
  { name: 'Windsurf', preferredFormat: 'standard', defaultPath: getWindsurfConfigPath },
  { name: 'Roocode-VSCode', preferredFormat: 'standard', defaultPath: (info) => getRoocodeConfigPath(info, 'Code') },
  { name: 'Roocode-Windsurf', preferredFormat: 'standard', defaultPath: (info) => getRoocodeConfigPath(info, 'Windsurf') },
];

export function currentPlatform(): PlatformInfo {
  return {
    platform: process.platform,
    homeDir: os.homedir(),
    appData: process.env.APPDATA,
  };
}

/**
 * Resolve every known app to an absolute path, applying `appPaths` overrides.
 * Called once at startup.
 */
export function resolveApps(
  overrides: Config['appPaths'] = {},
  info: PlatformInfo = currentPlatform()
): AppDescriptor[] {
  const unknown = Object.keys(overrides).filter(name => !KNOWN_APPS.some(app => app.name === name));
  if (unknown.length > 0) {
    throw new Error(`Unknown application(s) in appPaths: ${unknown.join(', ')}`);
  }

  return KNOWN_APPS.map(app => ({
    name: app.name,
    path: path.resolve(overrides[app.name] ?? app.defaultPath(info)),
    preferredFormat: app.preferredFormat,
  }));
}

export function findApp(apps: readonly AppDescriptor[], name: string): AppDescriptor | undefined {
  return apps.find(app => app.name === name);
}

/**
 * Look up a comma-separated or listed set of app names, failing on the first unknown one
 */
export function selectApps(apps: readonly AppDescriptor[], names: readonly string[]): AppDescriptor[] {
  return names.map(name => {
    const app = findApp(apps, name);
    if (!app) {
      const known = apps.map(a => a.name).join(', ');
      throw new Error(`Unknown application: ${name} (known: ${known})`);
    }
    return app;
  });
}
