import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';

export interface LoggingConfig {
  level: string;
  directory?: string;
}

export interface PlaylistConfig {
  baseUrl: string;
  version: number;
  windowSize: number;
  allowCache: boolean;
  chunked: boolean;
}

export interface CleanupConfig {
  enabled: boolean;
}

export interface AppConfig {
  logging: LoggingConfig;
  playlist: PlaylistConfig;
  cleanup: CleanupConfig;
}

type Section = Record<string, unknown>;

const isRecord = (value: unknown): value is Section =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

// A YAML value only replaces a default of the same type.
const readString = (section: Section | undefined, key: string, fallback: string): string => {
  const value = section?.[key];
  return typeof value === 'string' ? value : fallback;
};

const readNumber = (section: Section | undefined, key: string, fallback: number): number => {
  const value = section?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
};

const readBoolean = (section: Section | undefined, key: string, fallback: boolean): boolean => {
  const value = section?.[key];
  return typeof value === 'boolean' ? value : fallback;
};

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: AppConfig;
  private configPath: string;

  private constructor(configPath: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  public static getInstance(configPath?: string): ConfigLoader {
    if (!ConfigLoader.instance) {
      const defaultPath = path.join(process.cwd(), 'config.yaml');
      ConfigLoader.instance = new ConfigLoader(configPath || defaultPath);
    }
    return ConfigLoader.instance;
  }

  private loadConfig(): AppConfig {
    try {
      if (!fs.existsSync(this.configPath)) {
        console.warn(`Configuration file not found at ${this.configPath}, using default values`);
        const config = this.getDefaultConfig();
        this.applyEnvironmentOverrides(config);
        return config;
      }

      const fileContents = fs.readFileSync(this.configPath, 'utf8');
      const config = this.mergeWithDefaults(yaml.load(fileContents));

      this.applyEnvironmentOverrides(config);

      return config;
    } catch (error) {
      console.error(`Error loading configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return this.getDefaultConfig();
    }
  }

  private getDefaultConfig(): AppConfig {
    return {
      logging: {
        level: 'info'
      },
      playlist: {
        baseUrl: '',
        version: 3,
        windowSize: 0,
        allowCache: true,
        chunked: true
      },
      cleanup: {
        enabled: true
      }
    };
  }

  private mergeWithDefaults(loaded: unknown): AppConfig {
    const defaults = this.getDefaultConfig();
    const root: Section = isRecord(loaded) ? loaded : {};
    const section = (key: keyof AppConfig): Section | undefined => {
      const value = root[key];
      return isRecord(value) ? value : undefined;
    };

    const logging = section('logging');
    const playlist = section('playlist');
    const cleanup = section('cleanup');

    const config: AppConfig = {
      logging: {
        level: readString(logging, 'level', defaults.logging.level)
      },
      playlist: {
        baseUrl: readString(playlist, 'baseUrl', defaults.playlist.baseUrl),
        version: readNumber(playlist, 'version', defaults.playlist.version),
        windowSize: readNumber(playlist, 'windowSize', defaults.playlist.windowSize),
        allowCache: readBoolean(playlist, 'allowCache', defaults.playlist.allowCache),
        chunked: readBoolean(playlist, 'chunked', defaults.playlist.chunked)
      },
      cleanup: {
        enabled: readBoolean(cleanup, 'enabled', defaults.cleanup.enabled)
      }
    };

    const directory = readString(logging, 'directory', '');
    if (directory !== '') {
      config.logging.directory = directory;
    }

    return config;
  }

  private applyEnvironmentOverrides(config: AppConfig): void {
    if (process.env.LOG_LEVEL) {
      config.logging.level = process.env.LOG_LEVEL;
    }
    if (process.env.LOG_DIR) {
      config.logging.directory = process.env.LOG_DIR;
    }

    if (process.env.PLAYLIST_BASE_URL !== undefined) {
      config.playlist.baseUrl = process.env.PLAYLIST_BASE_URL;
    }
    if (process.env.PLAYLIST_VERSION) {
      const version = parseInt(process.env.PLAYLIST_VERSION, 10);
      if (!isNaN(version)) {
        config.playlist.version = version;
      }
    }
    if (process.env.PLAYLIST_WINDOW) {
      const windowSize = parseInt(process.env.PLAYLIST_WINDOW, 10);
      if (!isNaN(windowSize)) {
        config.playlist.windowSize = windowSize;
      }
    }

    if (process.env.CLEANUP_ENABLED) {
      config.cleanup.enabled = process.env.CLEANUP_ENABLED === 'true';
    }
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public reloadConfig(): AppConfig {
    this.config = this.loadConfig();
    return this.config;
  }

  public getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  public getPlaylistConfig(): PlaylistConfig {
    return this.config.playlist;
  }

  public getCleanupConfig(): CleanupConfig {
    return this.config.cleanup;
  }
}
