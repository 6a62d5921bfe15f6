import { PartialSettings, Settings } from '../types/Config';

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  verbose: false,
  jobs: 4,
  raw: false,
  preferStale: false,
  logLevel: 'info',
  alwaysKeepDownload: false,
  alwaysKeepInstall: false,
  legacyVersionFile: true,
  disableDefaultShorthands: false,
};

/**
 * Accumulates settings from the config file, the environment and CLI flags.
 * Later layers win.
 */
export class SettingsBuilder {
  private readonly values: PartialSettings;

  constructor(values: PartialSettings = {}) {
    this.values = { ...values };
  }

  merge(other: PartialSettings): this {
    for (const [key, value] of Object.entries(other)) {
      if (value !== undefined) {
        Object.assign(this.values, { [key]: value });
      }
    }
    return this;
  }

  build(): Settings {
    const settings: Settings = { ...DEFAULT_SETTINGS, ...this.values };

    if (settings.raw) {
      settings.verbose = true;
      settings.jobs = 1;
    }
    if (settings.jobs < 1) {
      settings.jobs = 1;
    }
    return settings;
  }
}
