import os from 'node:os';
import path from 'node:path';

export type AppDirKind = 'config' | 'data';

type DirEnv = Partial<
  Record<'XDG_CONFIG_HOME' | 'XDG_DATA_HOME' | 'APPDATA' | 'LOCALAPPDATA' | 'HOME', string>
>;

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim().length > 0 ? value : null;
}

function homeDir(env: DirEnv): string {
  const home = nonEmpty(env.HOME) ?? nonEmpty(os.homedir().trim());
  if (!home) {
    throw new Error('Unable to determine a home directory for pacecast files.');
  }
  return home;
}

export function resolveAppDir(
  kind: AppDirKind,
  appName: string,
  env: DirEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (platform === 'win32') {
    if (kind === 'config') {
      const base = nonEmpty(env.APPDATA) ?? path.join(homeDir(env), 'AppData', 'Roaming');
      return path.join(base, appName);
    }
    const base =
      nonEmpty(env.LOCALAPPDATA)
      ?? nonEmpty(env.APPDATA)
      ?? path.join(homeDir(env), 'AppData', 'Local');
    return path.join(base, appName, 'data');
  }

  if (kind === 'config') {
    const base = nonEmpty(env.XDG_CONFIG_HOME) ?? path.join(homeDir(env), '.config');
    return path.join(base, appName);
  }
  const base = nonEmpty(env.XDG_DATA_HOME) ?? path.join(homeDir(env), '.local', 'share');
  return path.join(base, appName, 'data');
}

export function getConfigDir(appName: string): string {
  return resolveAppDir('config', appName);
}

export function getDataDir(appName: string): string {
  return resolveAppDir('data', appName);
}
