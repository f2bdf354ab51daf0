import * as os from 'os';
import * as path from 'path';

export interface PlatformDirs {
  dataDir: string;
  cacheDir: string;
  configDir: string;
}

export interface PlatformInfo {
  platform: NodeJS.Platform;
  arch: string;
  env: NodeJS.ProcessEnv;
  homedir: string;
}

export function currentPlatform(): PlatformInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    env: process.env,
    homedir: os.homedir(),
  };
}

/**
 * Per-user application directories, following XDG on Linux and the native
 * conventions on macOS and Windows. Only the XDG variables are consulted;
 * explicit overrides are applied by the config layer.
 */
export function platformDirs(appName: string, info: PlatformInfo = currentPlatform()): PlatformDirs {
  const { platform, env, homedir } = info;
  // Windows and macOS paths must not depend on the host running the tests
  const join = platform === 'win32' ? path.win32.join : path.posix.join;

  switch (platform) {
    case 'darwin':
      return {
        dataDir: join(homedir, 'Library', 'Application Support', appName),
        cacheDir: join(homedir, 'Library', 'Caches', appName),
        configDir: join(homedir, 'Library', 'Application Support', appName),
      };
    case 'win32': {
      const localAppData = env.LOCALAPPDATA || join(homedir, 'AppData', 'Local');
      const roamingAppData = env.APPDATA || join(homedir, 'AppData', 'Roaming');
      return {
        dataDir: join(localAppData, appName, 'data'),
        cacheDir: join(localAppData, appName, 'cache'),
        configDir: join(roamingAppData, appName, 'config'),
      };
    }
    default:
      return {
        dataDir: join(env.XDG_DATA_HOME || join(homedir, '.local', 'share'), appName),
        cacheDir: join(env.XDG_CACHE_HOME || join(homedir, '.cache'), appName),
        configDir: join(env.XDG_CONFIG_HOME || join(homedir, '.config'), appName),
      };
  }
}

const TARGETS: Record<string, string> = {
  'linux-x64': 'x86_64-unknown-linux-gnu',
  'linux-arm64': 'aarch64-unknown-linux-gnu',
  'darwin-x64': 'x86_64-apple-darwin',
  'darwin-arm64': 'aarch64-apple-darwin',
  'win32-x64': 'x86_64-pc-windows-msvc',
};

/**
 * Target triple used by python-build-standalone asset names.
 */
export function targetTriple(info: Pick<PlatformInfo, 'platform' | 'arch'> = currentPlatform()): string {
  const triple = TARGETS[`${info.platform}-${info.arch}`];
  if (!triple) {
    throw new Error(`Unsupported platform: ${info.platform} ${info.arch}`);
  }
  return triple;
}

const PYPY_MARKERS: Record<string, string> = {
  'x86_64-unknown-linux-gnu': 'linux64',
  'aarch64-unknown-linux-gnu': 'aarch64',
  'x86_64-apple-darwin': 'macos_x86_64',
  'aarch64-apple-darwin': 'macos_arm64',
};

/**
 * Platform fragment of PyPy download file names, or null where PyPy ships no
 * tar.bz2 build.
 */
export function pypyPlatformMarker(target: string): string | null {
  return PYPY_MARKERS[target] ?? null;
}
