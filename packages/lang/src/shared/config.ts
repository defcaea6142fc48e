import type { ClausalConfig, ConfigOverrides } from "./types.js";

export class ConfigurationManager {
  static createDefault(): ClausalConfig {
    return {
      logging: {
        enabled: false,
        allowedIds: new Set(),
        deniedIds: new Set([
          "RELATION_CALLED", // one line per forced call
        ]),
      },
      query: {
        defaultLimit: Infinity,
      },
    };
  }

  static create(overrides: ConfigOverrides = {}): ClausalConfig {
    const defaultConfig = ConfigurationManager.createDefault();
    const defaultLimit =
      overrides.query?.defaultLimit ?? defaultConfig.query.defaultLimit;
    if (!(defaultLimit >= 0)) {
      throw new RangeError(
        `query.defaultLimit must be a non-negative number, got ${defaultLimit}`,
      );
    }
    return {
      logging: {
        ...defaultConfig.logging,
        ...overrides.logging,
      },
      query: {
        defaultLimit,
      },
    };
  }
}
