export interface ClausalConfig {
  readonly logging: LogConfig;
  readonly query: QueryConfig;
}

export interface LogConfig {
  readonly enabled: boolean;
  /** Only these ids are printed; empty means every id not denied. */
  readonly allowedIds: ReadonlySet<string>;
  readonly deniedIds: ReadonlySet<string>;
}

export interface QueryConfig {
  /** Applied when a query sets no limit of its own. */
  readonly defaultLimit: number;
}

export interface ConfigOverrides {
  readonly logging?: Partial<LogConfig>;
  readonly query?: Partial<QueryConfig>;
}
