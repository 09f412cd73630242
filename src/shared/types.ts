// Shared configuration types

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  app: {
    name: string;
    version: string;
    environment: 'development' | 'production' | 'test';
    logLevel: LogLevel;
  };
  store: {
    dbPath: string;
    populationSize: number;    // Maximum live programs
    archiveSize: number;       // Top performers protected from pruning
  };
  evolution: {
    eliteRatio: number;        // Share of parent picks drawn from the elite
    explorationRatio: number;  // Share of parent picks drawn uniformly
  };
}

export type ConfigOverrides = {
  [K in keyof Config]?: Partial<Config[K]>;
};
