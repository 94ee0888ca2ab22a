export type DatabaseConfig = {
  url?: string;
  type: 'postgres' | 'better-sqlite3';
  host?: string;
  port?: number;
  password?: string;
  name: string;
  username?: string;
  synchronize: boolean;
  migrationsRun: boolean;
  maxConnections: number;
  sslEnabled: boolean;
  rejectUnauthorized: boolean;
  ca?: string;
  key?: string;
  cert?: string;
  // false = no logging, true = all logging, array = specific log types
  logging: boolean | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];
};
