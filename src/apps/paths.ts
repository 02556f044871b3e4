import path from 'path';

export interface PlatformInfo {
  platform: NodeJS.Platform;
  homeDir: string;
  /** %APPDATA% on Windows */
  appData?: string;
}

/**
 * Per-user application-support directory for the platform.
 * Windows falls back to the usual Roaming location when APPDATA is unset.
 */
export function getAppSupportDir({ platform, homeDir, appData }: PlatformInfo): string {
  if (platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Application Support');
  }
  if (platform === 'win32') {
    return appData || path.join(homeDir, 'AppData', 'Roaming');
  }
  return path.join(homeDir, '.config');
}

export function getClaudeConfigPath(info: PlatformInfo): string {
  return path.join(getAppSupportDir(info), 'Claude', 'claude_desktop_config.json');
}

export function getVSCodeSettingsPath(info: PlatformInfo): string {
  return path.join(getAppSupportDir(info), 'Code', 'User', 'settings.json');
}

export function getCursorConfigPath({ homeDir }: PlatformInfo): string {
  return path.join(homeDir, '.cursor', 'mcp.json');
}

export function getWindsurfConfigPath({ homeDir }: PlatformInfo): string {
  return path.join(homeDir, '.codeium', 'windsurf', 'mcp_config.json');
}

const ROO_SETTINGS = ['globalStorage', 'rooveterinaryinc.roo-cline', 'settings', 'cline_mcp_settings.json'];

/**
 * Roo Code keeps its own MCP file inside the host editor's global storage
 */
export function getRoocodeConfigPath(info: PlatformInfo, editorDir: 'Code' | 'Windsurf'): string {
  return path.join(getAppSupportDir(info), editorDir, 'User', ...ROO_SETTINGS);
}

/**
 * Get the default mcp-config-sync config file path.
 */
export function getDefaultConfigPath(homeDir: string): string {
  return path.join(homeDir, '.mcp-config-sync', 'config.json');
}
